/**
 * Cart routes (logged-in users only)
 */

import { addLine, type CartError, removeLine, setQuantity, snapshot } from "#lib/db/cart.ts";
import { defineRoutes } from "#routes/router.ts";
import type { RouteParams } from "#routes/types.ts";
import {
  jsonError,
  jsonResponse,
  numberField,
  parseId,
  requireUser,
  withUserBody,
} from "#routes/utils.ts";

const CART_ERRORS: Record<CartError, [string, number]> = {
  InvalidQuantity: ["Quantity must be a whole number of at least 1", 400],
  ProductNotFound: ["Product not found", 404],
  LineNotFound: ["Cart item not found", 404],
};

const cartError = (error: CartError): Response => {
  const [message, status] = CART_ERRORS[error];
  return jsonError(message, status);
};

/**
 * POST /api/cart { product_id, quantity? }
 */
const handleAddLine = (request: Request): Promise<Response> =>
  withUserBody(request, async (user, body) => {
    const productId = numberField(body, "product_id");
    if (productId === undefined) return jsonError("product_id is required", 400);

    const quantity = "quantity" in body ? numberField(body, "quantity") : 1;
    if (quantity === undefined) return cartError("InvalidQuantity");

    const result = await addLine(user.id, productId, quantity);
    return result.ok ? jsonResponse({ line: result.line }, 201) : cartError(result.error);
  });

/**
 * PUT /api/cart/:lineId { quantity }
 */
const handleSetQuantity = (request: Request, params: RouteParams): Promise<Response> =>
  withUserBody(request, async (user, body) => {
    const lineId = parseId(params.lineId);
    if (lineId === null) return cartError("LineNotFound");

    const result = await setQuantity(user.id, lineId, numberField(body, "quantity") ?? 0);
    return result.ok ? jsonResponse({ line: result.line }) : cartError(result.error);
  });

/**
 * DELETE /api/cart/:lineId
 */
const handleRemoveLine = (request: Request, params: RouteParams): Promise<Response> =>
  requireUser(request, async (user) => {
    const lineId = parseId(params.lineId);
    if (lineId === null) return cartError("LineNotFound");

    const result = await removeLine(user.id, lineId);
    return result.ok ? jsonResponse({ ok: true }) : cartError(result.error);
  });

/** Cart routes */
export const cartRoutes = defineRoutes({
  "GET /api/cart": (request) =>
    requireUser(request, async (user) => jsonResponse(await snapshot(user.id))),
  "POST /api/cart": (request) => handleAddLine(request),
  "PUT /api/cart/:lineId": (request, params) => handleSetQuantity(request, params),
  "DELETE /api/cart/:lineId": (request, params) => handleRemoveLine(request, params),
});
