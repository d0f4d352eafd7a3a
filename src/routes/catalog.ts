/**
 * Catalog routes: listing, detail, search, reviews and recommendations
 */

import { DEFAULT_PRODUCT_LIMIT } from "#lib/config.ts";
import {
  getCategories,
  getProductDetail,
  listProducts,
  SORT_ORDERS,
  type SearchFilters,
  searchProducts,
  type SortOrder,
} from "#lib/db/products.ts";
import { getRecommendations } from "#lib/db/recommendations.ts";
import { submitReview } from "#lib/db/reviews.ts";
import { ErrorCode, logError } from "#lib/logger.ts";
import { defineRoutes } from "#routes/router.ts";
import type { RouteParams } from "#routes/types.ts";
import {
  getSearchParam,
  jsonError,
  jsonResponse,
  notFoundResponse,
  numberField,
  parseId,
  requireUser,
  stringField,
  withUserBody,
} from "#routes/utils.ts";

const MAX_PRODUCT_LIMIT = 100;

/** Parse ?limit=, clamped to 1..100 */
const parseLimit = (raw: string | null): number => {
  const limit = raw ? Number.parseInt(raw, 10) : DEFAULT_PRODUCT_LIMIT;
  if (Number.isNaN(limit)) return DEFAULT_PRODUCT_LIMIT;
  return Math.min(Math.max(limit, 1), MAX_PRODUCT_LIMIT);
};

/** Optional numeric query parameter; blank or malformed reads as absent */
const parsePrice = (raw: string | null): number | undefined => {
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
};

const isSortOrder = (value: string): value is SortOrder =>
  SORT_ORDERS.some((order) => order === value);

/** Build search filters from the query string */
export const parseSearchFilters = (request: Request): SearchFilters => {
  const param = (key: string) => getSearchParam(request, key)?.trim() || undefined;
  const sortBy = param("sort_by");
  return {
    query: param("q"),
    category: param("category"),
    gender: param("gender"),
    ageGroup: param("age_group"),
    minPrice: parsePrice(getSearchParam(request, "min_price")),
    maxPrice: parsePrice(getSearchParam(request, "max_price")),
    sortBy: sortBy && isSortOrder(sortBy) ? sortBy : "relevance",
  };
};

/**
 * GET /api/products/:id
 */
const handleProductDetail = async (params: RouteParams): Promise<Response> => {
  const id = parseId(params.id);
  const product = id === null ? null : await getProductDetail(id);
  if (!product) {
    logError({ code: ErrorCode.NOT_FOUND_PRODUCT });
    return notFoundResponse();
  }
  return jsonResponse(product);
};

/**
 * POST /api/products/:id/reviews
 */
const handleSubmitReview = (request: Request, params: RouteParams): Promise<Response> =>
  withUserBody(request, async (user, body) => {
    const id = parseId(params.id);
    if (id === null) return notFoundResponse();

    const result = await submitReview(
      user.id,
      id,
      numberField(body, "rating") ?? 0,
      stringField(body, "review_text") ?? "",
    );
    if (!result.ok) {
      return result.error === "ProductNotFound"
        ? notFoundResponse()
        : jsonError("Rating must be 1 to 5 and review text is required", 400);
    }
    return jsonResponse({ ok: true }, 201);
  });

/** Catalog routes */
export const catalogRoutes = defineRoutes({
  "GET /api/products": async (request) =>
    jsonResponse(await listProducts(parseLimit(getSearchParam(request, "limit")))),
  "GET /api/products/:id": (_request, params) => handleProductDetail(params),
  "POST /api/products/:id/reviews": (request, params) => handleSubmitReview(request, params),
  "GET /api/search": async (request) =>
    jsonResponse(await searchProducts(parseSearchFilters(request))),
  "GET /api/categories": async () => jsonResponse(await getCategories()),
  "GET /api/recommendations": (request) =>
    requireUser(request, async (user) => jsonResponse(await getRecommendations(user.id))),
});
