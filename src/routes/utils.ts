/**
 * Shared utilities for route handlers
 */

import { SESSION_TTL_MS } from "#lib/config.ts";
import { getSessionState } from "#lib/db/sessions.ts";
import { getUserById } from "#lib/db/users.ts";
import { ErrorCode, logError } from "#lib/logger.ts";
import { ANONYMOUS } from "#lib/otp.ts";
import type { SessionState, User } from "#lib/types.ts";

export const SESSION_COOKIE = "__Host-session";

/** JSON response helper */
export const jsonResponse = (data: unknown, status = 200, headers: Record<string, string> = {}): Response =>
  new Response(JSON.stringify(data), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });

/** JSON error body: { error } */
export const jsonError = (error: string, status: number): Response =>
  jsonResponse({ error }, status);

export const notFoundResponse = (): Response => jsonError("Not found", 404);

/** Parsed JSON object body */
export type JsonBody = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonBody =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Parse the request body as a JSON object, null when it is anything else */
export const parseJsonBody = async (request: Request): Promise<JsonBody | null> => {
  let value: unknown;
  try {
    value = await request.json();
  } catch {
    return null;
  }
  return isRecord(value) ? value : null;
};

/** Run a handler with the JSON object body, or 400 */
export const withJsonBody = async (
  request: Request,
  handler: (body: JsonBody) => Promise<Response>,
): Promise<Response> => {
  const body = await parseJsonBody(request);
  return body ? handler(body) : jsonError("Invalid JSON", 400);
};

/** String field from a body; other types read as missing */
export const stringField = (body: JsonBody, key: string): string | undefined => {
  const value = body[key];
  return typeof value === "string" ? value : undefined;
};

/** Numeric field from a body, accepting numeric strings */
export const numberField = (body: JsonBody, key: string): number | undefined => {
  const value = body[key];
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
};

/** Positive integer id from a path parameter */
export const parseId = (value: string | undefined): number | null => {
  if (!value || !/^\d+$/.test(value)) return null;
  const id = Number(value);
  return id > 0 && Number.isSafeInteger(id) ? id : null;
};

/** Get a query string parameter */
export const getSearchParam = (request: Request, key: string): string | null =>
  new URL(request.url).searchParams.get(key);

/** Read a cookie value from the request */
export const getCookie = (request: Request, name: string): string | null => {
  const header = request.headers.get("cookie");
  if (!header) return null;
  for (const part of header.split(";")) {
    const [key, ...rest] = part.trim().split("=");
    if (key === name) return rest.join("=") || null;
  }
  return null;
};

/** Set-Cookie value for a session token */
export const sessionCookie = (token: string, maxAgeMs: number = SESSION_TTL_MS): string =>
  `${SESSION_COOKIE}=${token}; HttpOnly; Secure; SameSite=Strict; Path=/; Max-Age=${Math.floor(maxAgeMs / 1000)}`;

/** Set-Cookie value that removes the session cookie */
export const clearSessionCookie = (): string =>
  `${SESSION_COOKIE}=; HttpOnly; Secure; SameSite=Strict; Path=/; Max-Age=0`;

export type LoadedSession = {
  token: string | null;
  state: SessionState;
};

/** Session token and state for a request; no cookie means anonymous */
export const loadSession = async (request: Request): Promise<LoadedSession> => {
  const token = getCookie(request, SESSION_COOKIE);
  return { token, state: token ? await getSessionState(token) : ANONYMOUS };
};

/**
 * Run a handler for the logged-in user, or 401.
 * A session whose user has since gone is treated as logged out.
 */
export const requireUser = async (
  request: Request,
  handler: (user: User) => Promise<Response>,
): Promise<Response> => {
  const { state } = await loadSession(request);
  if (state.status !== "authenticated") return jsonError("Login required", 401);

  const user = await getUserById(state.userId);
  if (!user) {
    logError({ code: ErrorCode.AUTH_SESSION_USER_MISSING });
    return jsonError("Login required", 401);
  }
  return handler(user);
};

/** requireUser + withJsonBody */
export const withUserBody = (
  request: Request,
  handler: (user: User, body: JsonBody) => Promise<Response>,
): Promise<Response> =>
  requireUser(request, (user) => withJsonBody(request, (body) => handler(user, body)));
