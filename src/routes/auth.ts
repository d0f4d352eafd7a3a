/**
 * Registration and two-step login routes
 *
 * Login is password first, then a mailed one-time code. The session
 * token is rotated when the code is accepted.
 */

import { PENDING_SESSION_TTL_MS } from "#lib/config.ts";
import { verifyCredentials } from "#lib/credentials.ts";
import { createSession, deleteSession, saveSession } from "#lib/db/sessions.ts";
import { isUsernameTaken, registerUser, type RegistrationError, toPublicUser } from "#lib/db/users.ts";
import { logDebug } from "#lib/logger.ts";
import { getMailer } from "#lib/mailer.ts";
import { ANONYMOUS, issueOtp, verifyOtp } from "#lib/otp.ts";
import { defineRoutes } from "#routes/router.ts";
import {
  clearSessionCookie,
  getSearchParam,
  jsonError,
  jsonResponse,
  loadSession,
  sessionCookie,
  stringField,
  withJsonBody,
} from "#routes/utils.ts";

const REGISTRATION_ERRORS: Record<RegistrationError, [string, number]> = {
  MissingRequiredField: ["Username, email and password are required", 400],
  InvalidDob: ["Date of birth must be YYYY-MM-DD", 400],
  InvalidPhoneNumber: ["Phone number must be up to 15 digits", 400],
  InvalidGender: ["Gender must be Male, Female or Other", 400],
  UsernameTaken: ["Username already taken", 409],
  EmailTaken: ["Email already registered", 409],
};

/**
 * POST /api/register
 */
const handleRegister = (request: Request): Promise<Response> =>
  withJsonBody(request, async (body) => {
    const result = await registerUser({
      username: stringField(body, "username")?.trim() ?? "",
      email: stringField(body, "email")?.trim() ?? "",
      password: stringField(body, "password") ?? "",
      dob: stringField(body, "dob"),
      phoneNumber: stringField(body, "phone_number"),
      gender: stringField(body, "gender"),
    });
    if (!result.ok) {
      const [message, status] = REGISTRATION_ERRORS[result.error];
      return jsonResponse({ error: message, code: result.error }, status);
    }
    return jsonResponse({ user: toPublicUser(result.user) }, 201);
  });

/**
 * GET /api/users/check?username=
 */
const handleCheckUsername = async (request: Request): Promise<Response> => {
  const username = getSearchParam(request, "username")?.trim();
  if (!username) return jsonError("username is required", 400);
  return jsonResponse({ taken: await isUsernameTaken(username) });
};

/**
 * POST /api/login: check the password, then mail a login code
 */
const handleLogin = (request: Request): Promise<Response> =>
  withJsonBody(request, async (body) => {
    const username = stringField(body, "username") ?? "";
    const password = stringField(body, "password") ?? "";
    if (!username || !password) return jsonError("Username and password are required", 400);

    const result = await verifyCredentials(username, password);
    if (!result.ok) {
      return result.error === "RateLimited"
        ? jsonError("Too many failed attempts. Try again later.", 429)
        : jsonError("Invalid username or password", 401);
    }

    const { state, delivered } = await issueOtp(result.user, getMailer());

    // Pending state is stored whether or not the code was delivered
    const { token: previous } = await loadSession(request);
    if (previous) await deleteSession(previous);
    const token = await createSession(state);
    const headers = { "set-cookie": sessionCookie(token, PENDING_SESSION_TTL_MS) };

    return delivered
      ? jsonResponse({ status: state.status }, 200, headers)
      : jsonResponse({ error: "Could not send login code", status: state.status }, 502, headers);
  });

/**
 * POST /api/login/otp: exchange the mailed code for a logged-in session
 */
const handleVerifyOtp = (request: Request): Promise<Response> =>
  withJsonBody(request, async (body) => {
    const code = stringField(body, "code")?.trim() ?? "";
    const { token, state } = await loadSession(request);
    const result = await verifyOtp(state, code);

    if (!result.ok) {
      if (result.error === "OtpMismatch") return jsonError("Incorrect code", 401);
      if (token && state.status === "otp_pending") await saveSession(token, ANONYMOUS);
      return jsonError("Login code expired. Please log in again.", 410);
    }

    if (token) await deleteSession(token);
    const fresh = await createSession(result.state);
    logDebug("Session", `User #${result.user.id} logged in`);

    return jsonResponse(
      { user: toPublicUser(result.user) },
      200,
      { "set-cookie": sessionCookie(fresh) },
    );
  });

/**
 * POST /api/logout
 */
const handleLogout = async (request: Request): Promise<Response> => {
  const { token } = await loadSession(request);
  if (token) await deleteSession(token);
  return jsonResponse({ ok: true }, 200, { "set-cookie": clearSessionCookie() });
};

/** Authentication routes */
export const authRoutes = defineRoutes({
  "POST /api/register": (request) => handleRegister(request),
  "GET /api/users/check": (request) => handleCheckUsername(request),
  "POST /api/login": (request) => handleLogin(request),
  "POST /api/login/otp": (request) => handleVerifyOtp(request),
  "POST /api/logout": (request) => handleLogout(request),
});
