/**
 * Minimal method + path router
 *
 * Route keys look like "GET /api/orders/:id". Routes are tried in
 * definition order; the first whose method and pattern match wins.
 */

import { map } from "#fp";
import type { RouteHandler, RouteParams, Router, Routes } from "#routes/types.ts";

type CompiledRoute = {
  method: string;
  pattern: RegExp;
  paramNames: string[];
  handler: RouteHandler;
};

const escapeRegex = (text: string): string =>
  text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/** Turn "/api/cart/:lineId" into a regex and its parameter names */
const compilePath = (path: string): { pattern: RegExp; paramNames: string[] } => {
  const paramNames: string[] = [];
  const source = map((segment: string) => {
    if (!segment.startsWith(":")) return escapeRegex(segment);
    paramNames.push(segment.slice(1));
    return "([^/]+)";
  })(path.split("/")).join("/");
  return { pattern: new RegExp(`^${source}$`), paramNames };
};

const compileRoute = ([key, handler]: [string, RouteHandler]): CompiledRoute => {
  const [method = "", path = ""] = key.split(" ");
  return { method, handler, ...compilePath(path) };
};

/** Decode a path segment, null for a malformed percent escape */
const decodeSegment = (value: string): string | null => {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
};

/** Route parameters, null when one cannot be decoded (the route does not match) */
const extractParams = (route: CompiledRoute, match: RegExpExecArray): RouteParams | null => {
  const params: RouteParams = {};
  for (const [index, name] of route.paramNames.entries()) {
    const value = match[index + 1];
    if (value === undefined) continue;
    const decoded = decodeSegment(value);
    if (decoded === null) return null;
    params[name] = decoded;
  }
  return params;
};

/** Identity helper so route tables are checked against the handler type */
export const defineRoutes = <T extends Routes>(routes: T): T => routes;

/** Build a router over a route table */
export const createRouter = (routes: Routes): Router => {
  const compiled = map(compileRoute)(Object.entries(routes));

  return async (request, path, method) => {
    for (const route of compiled) {
      if (route.method !== method) continue;
      const match = route.pattern.exec(path);
      const params = match ? extractParams(route, match) : null;
      if (params) return await route.handler(request, params);
    }
    return null;
  };
};
