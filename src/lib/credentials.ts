/**
 * Credential store: password verification behind the login rate limiter
 */

import { verifyPassword } from "#lib/crypto.ts";
import { isLoginRateLimited, recordFailedLogin } from "#lib/db/login-attempts.ts";
import { getUserByUsername } from "#lib/db/users.ts";
import { ErrorCode, logError } from "#lib/logger.ts";
import type { User } from "#lib/types.ts";

export type CredentialError = "RateLimited" | "InvalidCredentials";

export type CredentialResult =
  | { ok: true; user: User }
  | { ok: false; error: CredentialError };

/**
 * Verify a username and password.
 *
 * A rate-limited user is refused before the password is checked.
 * Every mismatch, including an unknown username, is written to the
 * attempt ledger and reported as InvalidCredentials.
 */
export const verifyCredentials = async (
  username: string,
  password: string,
  now: number = Date.now(),
): Promise<CredentialResult> => {
  const user = await getUserByUsername(username);

  if (user && await isLoginRateLimited(user.id, now)) {
    logError({ code: ErrorCode.AUTH_RATE_LIMITED });
    return { ok: false, error: "RateLimited" };
  }

  if (user && await verifyPassword(user.password_hash, password)) {
    return { ok: true, user };
  }

  await recordFailedLogin(user?.id ?? null, username, now);
  return { ok: false, error: "InvalidCredentials" };
};
