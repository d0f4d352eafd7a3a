/**
 * Session store
 *
 * Sessions hold the login state for a browser, keyed by the SHA-256
 * of the cookie token. Raw tokens are never stored.
 */

import { PENDING_SESSION_TTL_MS, SESSION_TTL_MS } from "#lib/config.ts";
import { generateSecureToken, sha256Hex } from "#lib/crypto.ts";
import { execute, queryOne } from "#lib/db/client.ts";
import type { SessionState } from "#lib/types.ts";

type SessionRow = { state: string; expires: number };

const ANONYMOUS: SessionState = { status: "anonymous" };

/** Pending sessions only need to outlive the login code */
const ttlFor = (state: SessionState): number =>
  state.status === "authenticated" ? SESSION_TTL_MS : PENDING_SESSION_TTL_MS;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

/** Decode a stored state, rejecting anything malformed */
export const parseSessionState = (json: string): SessionState | null => {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    return null;
  }
  if (!isRecord(value)) return null;

  if (value.status === "anonymous") return ANONYMOUS;

  if (value.status === "authenticated" && typeof value.userId === "number") {
    return { status: "authenticated", userId: value.userId };
  }

  if (value.status === "otp_pending" && isRecord(value.challenge)) {
    const { userId, code, issuedAt } = value.challenge;
    if (typeof userId === "number" && typeof code === "string" && typeof issuedAt === "number") {
      return { status: "otp_pending", challenge: { userId, code, issuedAt } };
    }
  }

  return null;
};

/** Store state under a token, replacing whatever was there */
export const saveSession = async (
  token: string,
  state: SessionState,
  now: number = Date.now(),
): Promise<void> => {
  await execute(
    "INSERT OR REPLACE INTO sessions (token, state, expires) VALUES (?, ?, ?)",
    [await sha256Hex(token), JSON.stringify(state), now + ttlFor(state)],
  );
};

/** Delete every expired session, returning how many went */
export const purgeExpiredSessions = (now: number = Date.now()): Promise<number> =>
  execute("DELETE FROM sessions WHERE expires <= ?", [now]);

/**
 * Start a new session, returning the raw token for the cookie.
 * Expired sessions are purged first.
 */
export const createSession = async (
  state: SessionState,
  now: number = Date.now(),
): Promise<string> => {
  await purgeExpiredSessions(now);
  const token = generateSecureToken();
  await saveSession(token, state, now);
  return token;
};

/**
 * Load the state for a token.
 * Unknown, expired or unreadable sessions are anonymous.
 */
export const getSessionState = async (
  token: string,
  now: number = Date.now(),
): Promise<SessionState> => {
  const hashed = await sha256Hex(token);
  const row = await queryOne<SessionRow>(
    "SELECT state, expires FROM sessions WHERE token = ?",
    [hashed],
  );
  if (!row) return ANONYMOUS;

  if (row.expires <= now) {
    await execute("DELETE FROM sessions WHERE token = ?", [hashed]);
    return ANONYMOUS;
  }

  return parseSessionState(row.state) ?? ANONYMOUS;
};

/** Delete a session (logout) */
export const deleteSession = async (token: string): Promise<void> => {
  await execute("DELETE FROM sessions WHERE token = ?", [await sha256Hex(token)]);
};
