import { afterEach, describe, expect, spyOn, test, vi } from "#test-compat";
import { hmacSha256Hex } from "#lib/crypto.ts";
import { deleteEnv, setEnv } from "#lib/env.ts";
import { buildMailHeaders, getMailer, setMailer, webhookMailer } from "#lib/mailer.ts";

describe("mailer", () => {
  afterEach(() => {
    deleteEnv("MAIL_WEBHOOK_URL");
    deleteEnv("MAIL_WEBHOOK_SECRET");
    setMailer(null);
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe("buildMailHeaders", () => {
    test("unsigned without a secret", async () => {
      expect(await buildMailHeaders("{}", null)).toEqual({ "content-type": "application/json" });
    });

    test("signs the body with the secret", async () => {
      const headers = await buildMailHeaders('{"a":1}', "test-secret");
      expect(headers["x-webhook-signature"]).toBe(await hmacSha256Hex("test-secret", '{"a":1}'));
    });
  });

  describe("webhookMailer", () => {
    test("posts a signed JSON payload", async () => {
      spyOn(console, "debug").mockImplementation(() => undefined);
      setEnv("MAIL_WEBHOOK_URL", "https://mail.test/send");
      setEnv("MAIL_WEBHOOK_SECRET", "test-secret");
      const fetchMock = vi.fn((_url: string, _init?: RequestInit) =>
        Promise.resolve(new Response(null, { status: 202 }))
      );
      vi.stubGlobal("fetch", fetchMock);

      await webhookMailer.send("alice@example.com", "Hello", "Body text");

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const call = fetchMock.mock.calls[0];
      const init = call?.[1];
      expect(call?.[0]).toBe("https://mail.test/send");
      expect(init).toMatchObject({ method: "POST" });
      expect(JSON.parse(String(init?.body))).toMatchObject({
        to: "alice@example.com",
        subject: "Hello",
        body: "Body text",
      });
    });

    test("rejects on a failed response", async () => {
      spyOn(console, "debug").mockImplementation(() => undefined);
      spyOn(console, "error").mockImplementation(() => undefined);
      setEnv("MAIL_WEBHOOK_URL", "https://mail.test/send");
      vi.stubGlobal("fetch", vi.fn(() => Promise.resolve(new Response(null, { status: 500 }))));

      await expect(webhookMailer.send("a@example.com", "s", "b")).rejects.toThrow(
        "Mail webhook responded with 500",
      );
    });

    test("rejects when no webhook is configured", async () => {
      spyOn(console, "error").mockImplementation(() => undefined);
      await expect(webhookMailer.send("a@example.com", "s", "b")).rejects.toThrow(
        "MAIL_WEBHOOK_URL environment variable is required",
      );
    });
  });

  test("setMailer overrides and null restores the webhook mailer", () => {
    const custom = { send: () => Promise.resolve() };
    setMailer(custom);
    expect(getMailer()).toBe(custom);
    setMailer(null);
    expect(getMailer()).toBe(webhookMailer);
  });
});
