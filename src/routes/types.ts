/**
 * Shared route types
 */

/** Path parameters captured from `:name` segments */
export type RouteParams = Record<string, string | undefined>;

export type RouteHandler = (
  request: Request,
  params: RouteParams,
) => Response | Promise<Response>;

/** Route table keyed by "METHOD /path/:param" */
export type Routes = Record<string, RouteHandler>;

/** A router answers null when no route matches */
export type Router = (
  request: Request,
  path: string,
  method: string,
) => Promise<Response | null>;
