/**
 * Middleware functions for request processing
 */

import { getAllowedDomain } from "#lib/config.ts";

/**
 * Security headers for all responses.
 * Everything served is JSON, so nothing may be framed or loaded.
 */
const SECURITY_HEADERS: Record<string, string> = {
  "x-content-type-options": "nosniff",
  "referrer-policy": "strict-origin-when-cross-origin",
  "x-frame-options": "DENY",
  "content-security-policy": "default-src 'none'; frame-ancestors 'none'",
  "cache-control": "no-store",
};

export const getSecurityHeaders = (): Record<string, string> => ({ ...SECURITY_HEADERS });

/**
 * Extract hostname from Host header (removes port if present)
 */
const getHostname = (host: string): string => {
  const colonIndex = host.indexOf(":");
  return colonIndex === -1 ? host : host.slice(0, colonIndex);
};

/**
 * Validate request domain against ALLOWED_DOMAIN.
 * Checks the Host header to prevent the app being served through unauthorized proxies.
 */
export const isValidDomain = (request: Request): boolean => {
  const host = request.headers.get("host");
  if (!host) {
    return false;
  }
  return getHostname(host) === getAllowedDomain();
};

/**
 * Validate Content-Type for requests with a body.
 * POST and PUT bodies must be JSON; bodiless requests pass.
 */
export const isValidContentType = (request: Request): boolean => {
  if ((request.method !== "POST" && request.method !== "PUT") || request.body === null) {
    return true;
  }
  const contentType = request.headers.get("content-type") || "";
  return contentType.startsWith("application/json");
};

/** Plain text rejection carrying the security headers */
const rejection = (message: string, status: number): Response =>
  new Response(message, {
    status,
    headers: {
      "content-type": "text/plain",
      ...getSecurityHeaders(),
    },
  });

/**
 * Create Content-Type rejection response
 */
export const contentTypeRejectionResponse = (): Response =>
  rejection("Bad Request: Invalid Content-Type", 400);

/**
 * Create domain rejection response
 */
export const domainRejectionResponse = (): Response =>
  rejection("Forbidden: Invalid domain", 403);

/** Clone a response with additional headers merged in */
const withHeaders = (
  response: Response,
  extra: Record<string, string>,
): Response => {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(extra)) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
};

/**
 * Apply security headers to a response
 */
export const applySecurityHeaders = (response: Response): Response =>
  withHeaders(response, SECURITY_HEADERS);
