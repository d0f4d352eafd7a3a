/**
 * One-time login code state machine
 *
 * anonymous -> (password verified) -> otp_pending -> authenticated
 * otp_pending -> anonymous once the code has expired
 *
 * Functions take the current session state and return the next one;
 * persisting it is the caller's job.
 */

import { getMailFromName, OTP_VALIDITY_MS } from "#lib/config.ts";
import { constantTimeEqual, randomIntInclusive } from "#lib/crypto.ts";
import { getUserById } from "#lib/db/users.ts";
import { ErrorCode, errorDetail, logDebug, logError } from "#lib/logger.ts";
import type { Mailer } from "#lib/mailer.ts";
import type { OtpChallenge, SessionState, User } from "#lib/types.ts";

export const OTP_MIN = 100_000;
export const OTP_MAX = 999_999;

export const ANONYMOUS: SessionState = { status: "anonymous" };

type PendingState = Extract<SessionState, { status: "otp_pending" }>;
type AuthenticatedState = Extract<SessionState, { status: "authenticated" }>;

/** Six-digit code, uniform over 100000-999999 */
export const generateOtpCode = (): string =>
  String(randomIntInclusive(OTP_MIN, OTP_MAX));

/** A code is accepted up to and including the five minute mark */
export const isOtpExpired = (challenge: OtpChallenge, now: number): boolean =>
  now - challenge.issuedAt > OTP_VALIDITY_MS;

const otpMessage = (user: Pick<User, "username">, code: string) => ({
  subject: `Your ${getMailFromName()} login code`,
  body: `Hello ${user.username},\n\nYour one-time login code is: ${code}\nIt expires in 5 minutes.`,
});

export type IssueOtpResult = {
  state: PendingState;
  delivered: boolean;
};

/**
 * Issue a code for a user whose password has been verified and mail it.
 * The pending state is returned whether or not delivery succeeded.
 */
export const issueOtp = async (
  user: Pick<User, "id" | "username" | "email">,
  mailer: Mailer,
  now: number = Date.now(),
): Promise<IssueOtpResult> => {
  const code = generateOtpCode();
  const state: PendingState = {
    status: "otp_pending",
    challenge: { userId: user.id, code, issuedAt: now },
  };

  const { subject, body } = otpMessage(user, code);
  try {
    await mailer.send(user.email, subject, body);
  } catch (error) {
    logError({ code: ErrorCode.MAIL_SEND, detail: errorDetail(error) });
    return { state, delivered: false };
  }

  logDebug("Auth", `Login code issued for user #${user.id}`);
  return { state, delivered: true };
};

export type OtpError = "OtpExpired" | "OtpMismatch";

export type VerifyOtpResult =
  | { ok: true; state: AuthenticatedState; user: User }
  | { ok: false; error: OtpError; state: SessionState };

/**
 * Check a submitted code against the pending challenge.
 *
 * Expired challenges reset the session to anonymous. Without a pending
 * challenge the result is OtpExpired and the state is left as it was.
 * A wrong code leaves the challenge in place for another try.
 * A match discards the challenge and authenticates the session.
 */
export const verifyOtp = async (
  state: SessionState,
  code: string,
  now: number = Date.now(),
): Promise<VerifyOtpResult> => {
  if (state.status !== "otp_pending") {
    return { ok: false, error: "OtpExpired", state };
  }

  const { challenge } = state;
  if (isOtpExpired(challenge, now)) {
    logError({ code: ErrorCode.AUTH_OTP_EXPIRED });
    return { ok: false, error: "OtpExpired", state: ANONYMOUS };
  }

  if (!constantTimeEqual(code, challenge.code)) {
    return { ok: false, error: "OtpMismatch", state };
  }

  const user = await getUserById(challenge.userId);
  if (!user) {
    logError({ code: ErrorCode.AUTH_SESSION_USER_MISSING });
    return { ok: false, error: "OtpExpired", state: ANONYMOUS };
  }

  return { ok: true, state: { status: "authenticated", userId: user.id }, user };
};
