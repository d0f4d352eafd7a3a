/**
 * Privacy-safe logging
 *
 * Request paths have numeric identifiers redacted and errors are logged
 * as codes plus an optional short detail, never with user data.
 */

/** Error codes for structured error logging */
export const ErrorCode = {
  // Database
  DB_CONNECTION: "E_DB_CONNECTION",
  DB_QUERY: "E_DB_QUERY",
  DB_TRANSACTION: "E_DB_TRANSACTION",

  // Authentication
  AUTH_RATE_LIMITED: "E_AUTH_RATE_LIMITED",
  AUTH_OTP_EXPIRED: "E_AUTH_OTP_EXPIRED",
  AUTH_SESSION_USER_MISSING: "E_AUTH_SESSION_USER_MISSING",

  // Mail
  MAIL_SEND: "E_MAIL_SEND",
  MAIL_NOT_CONFIGURED: "E_MAIL_NOT_CONFIGURED",

  // Catalog reads
  CATALOG_SEARCH: "E_CATALOG_SEARCH",
  CATALOG_RECOMMENDATIONS: "E_CATALOG_RECOMMENDATIONS",

  // Checkout
  CHECKOUT_STOCK_CONFLICT: "E_CHECKOUT_STOCK_CONFLICT",

  // Not found
  NOT_FOUND_PRODUCT: "E_NOT_FOUND_PRODUCT",
  NOT_FOUND_ORDER: "E_NOT_FOUND_ORDER",

  // Request handling
  REQUEST_UNHANDLED: "E_REQUEST_UNHANDLED",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Categories for debug output */
export type LogCategory =
  | "Auth"
  | "Cart"
  | "Checkout"
  | "Mail"
  | "Migration"
  | "Server"
  | "Session";

/**
 * Replace numeric path segments with [id]
 * e.g. /api/orders/42 -> /api/orders/[id]
 */
export const redactPath = (path: string): string =>
  path.replace(/\/\d+(?=\/|$)/g, "/[id]");

type RequestLog = {
  method: string;
  path: string;
  status: number;
  durationMs: number;
};

/** Log a completed request */
export const logRequest = ({ method, path, status, durationMs }: RequestLog): void => {
  console.debug(`[Request] ${method} ${redactPath(path)} ${status} ${durationMs}ms`);
};

type ErrorLog = {
  code: ErrorCodeType;
  detail?: string;
};

/** Log an error by code, with an optional short detail */
export const logError = ({ code, detail }: ErrorLog): void => {
  const suffix = detail === undefined ? "" : ` detail="${detail}"`;
  console.error(`[Error] ${code}${suffix}`);
};

/** Debug message under a category */
export const logDebug = (category: LogCategory, message: string): void => {
  console.debug(`[${category}] ${message}`);
};

/** Start a timer; the returned function gives elapsed whole milliseconds */
export const createRequestTimer = (): (() => number) => {
  const start = performance.now();
  return () => Math.round(performance.now() - start);
};

/** Message of an unknown thrown value */
export const errorDetail = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
