/**
 * Wishlist routes
 */

import { addToWishlist, getWishlist, removeFromWishlist } from "#lib/db/wishlist.ts";
import { defineRoutes } from "#routes/router.ts";
import type { RouteParams } from "#routes/types.ts";
import { jsonError, jsonResponse, parseId, requireUser } from "#routes/utils.ts";

const handleAdd = (request: Request, params: RouteParams): Promise<Response> =>
  requireUser(request, async (user) => {
    const productId = parseId(params.productId);
    const result = productId === null ? null : await addToWishlist(user.id, productId);
    if (!result?.ok) return jsonError("Product not found", 404);
    return jsonResponse({ added: result.added }, result.added ? 201 : 200);
  });

const handleRemove = (request: Request, params: RouteParams): Promise<Response> =>
  requireUser(request, async (user) => {
    const productId = parseId(params.productId);
    const result = productId === null ? null : await removeFromWishlist(user.id, productId);
    if (!result?.ok) return jsonError("Wishlist item not found", 404);
    return jsonResponse({ ok: true });
  });

/** Wishlist routes */
export const wishlistRoutes = defineRoutes({
  "GET /api/wishlist": (request) =>
    requireUser(request, async (user) => jsonResponse(await getWishlist(user.id))),
  "POST /api/wishlist/:productId": (request, params) => handleAdd(request, params),
  "DELETE /api/wishlist/:productId": (request, params) => handleRemove(request, params),
});
