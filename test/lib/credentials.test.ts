import { afterEach, beforeEach, describe, expect, spyOn, test, vi } from "#test-compat";
import { verifyCredentials } from "#lib/credentials.ts";
import { countRecentAttempts, recordFailedLogin } from "#lib/db/login-attempts.ts";
import { queryOne } from "#lib/db/client.ts";
import { createTestDb, createTestUser, expectResultError, resetDb, TEST_PASSWORD } from "#test-utils";

const NOW = 1_700_000_000_000;
const MINUTE = 60 * 1000;

describe("credentials", () => {
  beforeEach(async () => {
    await createTestDb();
  });

  afterEach(() => {
    resetDb();
    vi.restoreAllMocks();
  });

  test("accepts the correct password", async () => {
    const user = await createTestUser({ username: "alice" });
    const result = await verifyCredentials("alice", TEST_PASSWORD, NOW);
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.user.id).toBe(user.id);
  });

  test("records a failed attempt for a wrong password", async () => {
    const user = await createTestUser({ username: "alice" });
    expectResultError("InvalidCredentials")(await verifyCredentials("alice", "wrong", NOW));
    expect(await countRecentAttempts(user.id, NOW)).toBe(1);
  });

  test("unknown usernames are recorded without a user id", async () => {
    expectResultError("InvalidCredentials")(await verifyCredentials("nobody", "wrong", NOW));
    const row = await queryOne<{ user_id: number | null; username: string }>(
      "SELECT user_id, username FROM login_attempts",
    );
    expect(row).toEqual({ user_id: null, username: "nobody" });
  });

  test("blocks the sixth attempt even with the right password", async () => {
    spyOn(console, "error").mockImplementation(() => undefined);
    await createTestUser({ username: "alice" });
    for (let i = 0; i < 5; i++) {
      expectResultError("InvalidCredentials")(await verifyCredentials("alice", "wrong", NOW + i));
    }
    expectResultError("RateLimited")(await verifyCredentials("alice", TEST_PASSWORD, NOW + 10));
  });

  test("rate limited attempts are not added to the ledger", async () => {
    spyOn(console, "error").mockImplementation(() => undefined);
    const user = await createTestUser({ username: "alice" });
    for (let i = 0; i < 5; i++) await recordFailedLogin(user.id, "alice", NOW);
    await verifyCredentials("alice", "wrong", NOW);
    expect(await countRecentAttempts(user.id, NOW)).toBe(5);
  });

  test("attempts older than an hour no longer count", async () => {
    const user = await createTestUser({ username: "alice" });
    for (let i = 0; i < 5; i++) await recordFailedLogin(user.id, "alice", NOW);
    const later = NOW + 60 * MINUTE;
    expect(await countRecentAttempts(user.id, later)).toBe(0);
    expect((await verifyCredentials("alice", TEST_PASSWORD, later)).ok).toBe(true);
  });

  test("four recent failures still allow a login", async () => {
    const user = await createTestUser({ username: "alice" });
    for (let i = 0; i < 4; i++) await recordFailedLogin(user.id, "alice", NOW);
    expect((await verifyCredentials("alice", TEST_PASSWORD, NOW + MINUTE)).ok).toBe(true);
  });
});
