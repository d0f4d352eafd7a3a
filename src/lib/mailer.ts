/**
 * Outbound mail
 *
 * Mail is handed to a delivery service through a signed JSON webhook.
 * Receivers verify the X-Webhook-Signature header, an HMAC-SHA256 of
 * the raw body keyed with MAIL_WEBHOOK_SECRET.
 */

import { lazyRef } from "#fp";
import { getMailFromName, getMailWebhookSecret, getMailWebhookUrl } from "#lib/config.ts";
import { hmacSha256Hex } from "#lib/crypto.ts";
import { ErrorCode, logDebug, logError } from "#lib/logger.ts";

/** Mail delivery collaborator; send rejects when delivery fails */
export interface Mailer {
  send(to: string, subject: string, body: string): Promise<void>;
}

/** Payload posted to the mail webhook */
export type MailPayload = {
  from: string;
  to: string;
  subject: string;
  body: string;
  timestamp: string;
};

/** Build request headers, signing the body when a secret is configured */
export const buildMailHeaders = async (
  body: string,
  secret: string | null,
): Promise<Record<string, string>> => {
  const headers: Record<string, string> = { "content-type": "application/json" };
  if (secret) {
    headers["x-webhook-signature"] = await hmacSha256Hex(secret, body);
  }
  return headers;
};

/** Mailer that posts each message to MAIL_WEBHOOK_URL */
export const webhookMailer: Mailer = {
  async send(to, subject, body) {
    const url = getMailWebhookUrl();
    if (!url) {
      logError({ code: ErrorCode.MAIL_NOT_CONFIGURED });
      throw new Error("MAIL_WEBHOOK_URL environment variable is required");
    }

    const payload: MailPayload = {
      from: getMailFromName(),
      to,
      subject,
      body,
      timestamp: new Date().toISOString(),
    };
    const json = JSON.stringify(payload);

    logDebug("Mail", `Sending "${subject}"`);
    const response = await fetch(url, {
      method: "POST",
      headers: await buildMailHeaders(json, getMailWebhookSecret()),
      body: json,
    });

    if (!response.ok) {
      logError({ code: ErrorCode.MAIL_SEND, detail: `status ${response.status}` });
      throw new Error(`Mail webhook responded with ${response.status}`);
    }
  },
};

const [mailerGetter, mailerSetter] = lazyRef((): Mailer => webhookMailer);

/** Active mailer */
export const getMailer = (): Mailer => mailerGetter();

/** Replace the mailer (for testing); null restores the webhook mailer */
export const setMailer = (mailer: Mailer | null): void => mailerSetter(mailer);
