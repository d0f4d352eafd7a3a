/**
 * Request entry point: host and content-type checks, routing,
 * request logging and the last-resort error response
 */

import { createRequestTimer, ErrorCode, errorDetail, logError, logRequest } from "#lib/logger.ts";
import { accountRoutes } from "#routes/account.ts";
import { authRoutes } from "#routes/auth.ts";
import { cartRoutes } from "#routes/cart.ts";
import { catalogRoutes } from "#routes/catalog.ts";
import {
  applySecurityHeaders,
  contentTypeRejectionResponse,
  domainRejectionResponse,
  isValidContentType,
  isValidDomain,
} from "#routes/middleware.ts";
import { orderRoutes } from "#routes/orders.ts";
import { createRouter } from "#routes/router.ts";
import { jsonError, notFoundResponse } from "#routes/utils.ts";
import { wishlistRoutes } from "#routes/wishlist.ts";

const routeApi = createRouter({
  ...authRoutes,
  ...catalogRoutes,
  ...cartRoutes,
  ...wishlistRoutes,
  ...orderRoutes,
  ...accountRoutes,
});

const route = async (request: Request, path: string): Promise<Response> => {
  if (!isValidDomain(request)) return domainRejectionResponse();
  if (!isValidContentType(request)) return contentTypeRejectionResponse();
  return (await routeApi(request, path, request.method)) ?? notFoundResponse();
};

/**
 * Handle a request. Never rejects: unexpected errors become a 500.
 */
export const handleRequest = async (request: Request): Promise<Response> => {
  const elapsed = createRequestTimer();
  const path = new URL(request.url).pathname;

  let response: Response;
  try {
    response = await route(request, path);
  } catch (error) {
    logError({ code: ErrorCode.REQUEST_UNHANDLED, detail: errorDetail(error) });
    response = jsonError("Internal server error", 500);
  }

  logRequest({ method: request.method, path, status: response.status, durationMs: elapsed() });
  return applySecurityHeaders(response);
};
