/**
 * Login attempt ledger (rate limiting)
 *
 * Every failed password check appends a row. A user with
 * MAX_LOGIN_ATTEMPTS rows inside the trailing window is refused
 * until old rows age out; nothing is deleted.
 */

import { LOGIN_ATTEMPT_WINDOW_MS, MAX_LOGIN_ATTEMPTS } from "#lib/config.ts";
import { execute, queryOne } from "#lib/db/client.ts";

/** Count failed attempts for a user inside the trailing window */
export const countRecentAttempts = async (
  userId: number,
  now: number = Date.now(),
): Promise<number> => {
  // COUNT(*) always returns a row
  const row = await queryOne<{ count: number }>(
    "SELECT COUNT(*) as count FROM login_attempts WHERE user_id = ? AND attempted_at > ?",
    [userId, now - LOGIN_ATTEMPT_WINDOW_MS],
  );
  return row?.count ?? 0;
};

/** Check whether a user has exhausted their attempts */
export const isLoginRateLimited = async (
  userId: number,
  now: number = Date.now(),
): Promise<boolean> =>
  (await countRecentAttempts(userId, now)) >= MAX_LOGIN_ATTEMPTS;

/**
 * Record a failed login.
 * userId is null when the username did not resolve to a user.
 */
export const recordFailedLogin = async (
  userId: number | null,
  username: string,
  now: number = Date.now(),
): Promise<void> => {
  await execute(
    "INSERT INTO login_attempts (user_id, username, attempted_at) VALUES (?, ?, ?)",
    [userId, username, now],
  );
};
