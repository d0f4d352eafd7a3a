/**
 * Configuration derived from environment variables
 */

import { getEnv } from "#lib/env.ts";

/** One-time login codes are valid for exactly five minutes */
export const OTP_VALIDITY_MS = 5 * 60 * 1000;

/** Failed logins counted within this trailing window */
export const LOGIN_ATTEMPT_WINDOW_MS = 60 * 60 * 1000;

/** Attempts within the window at which logins are refused */
export const MAX_LOGIN_ATTEMPTS = 5;

/** Lifetime of an authenticated session */
export const SESSION_TTL_MS = 24 * 60 * 60 * 1000;

/** Lifetime of a session still waiting for its login code (outlives the OTP window) */
export const PENDING_SESSION_TTL_MS = 10 * 60 * 1000;

/** Default page size for the catalog listing */
export const DEFAULT_PRODUCT_LIMIT = 10;

/** Domain requests must be addressed to (Host header check) */
export const getAllowedDomain = (): string =>
  getEnv("ALLOWED_DOMAIN") ?? "localhost";

/** Outbound mail webhook, null when mail delivery is not configured */
export const getMailWebhookUrl = (): string | null =>
  getEnv("MAIL_WEBHOOK_URL") ?? null;

/** Secret used to sign outbound mail webhook payloads */
export const getMailWebhookSecret = (): string | null =>
  getEnv("MAIL_WEBHOOK_SECRET") ?? null;

/** Sender display name used in outbound mail */
export const getMailFromName = (): string =>
  getEnv("MAIL_FROM_NAME") ?? "Storefront";

/** Port the HTTP server listens on */
export const getPort = (): number => {
  const raw = getEnv("PORT");
  const port = raw ? Number.parseInt(raw, 10) : Number.NaN;
  return Number.isInteger(port) && port > 0 ? port : 3000;
};
