/**
 * Checkout, order history and dashboard routes
 */

import {
  type CheckoutFailure,
  checkout,
  type CheckoutRequest,
  DELIVERY_FIELDS,
  type DeliveryField,
  getOrderForUser,
  getOrderSummary,
  listOrdersForUser,
} from "#lib/db/orders.ts";
import { toPublicUser } from "#lib/db/users.ts";
import { ErrorCode, logError } from "#lib/logger.ts";
import { defineRoutes } from "#routes/router.ts";
import type { RouteParams } from "#routes/types.ts";
import {
  type JsonBody,
  jsonResponse,
  notFoundResponse,
  parseId,
  requireUser,
  stringField,
  withUserBody,
} from "#routes/utils.ts";

/** Map the checkout form onto a checkout request */
export const toCheckoutRequest = (body: JsonBody): CheckoutRequest => {
  const delivery: Partial<Record<DeliveryField, string>> = {};
  for (const field of DELIVERY_FIELDS) {
    const value = stringField(body, field);
    if (value !== undefined) delivery[field] = value;
  }
  const paymentMode = stringField(body, "payment_mode");
  return {
    delivery,
    paymentMode,
    paymentDetail: paymentMode === "UPI"
      ? stringField(body, "upi_id")
      : stringField(body, "card_number"),
  };
};

const checkoutFailureResponse = (failure: CheckoutFailure): Response => {
  switch (failure.error) {
    case "EmptyCart":
      return jsonResponse({ error: "Your cart is empty", code: failure.error }, 409);
    case "MissingDeliveryField":
      return jsonResponse(
        { error: `${failure.field} is required`, code: failure.error, field: failure.field },
        400,
      );
    case "InvalidPaymentDetail":
      return jsonResponse(
        { error: "Invalid payment details", code: failure.error, problem: failure.problem },
        400,
      );
    case "InsufficientStock":
      return jsonResponse(
        {
          error: `Not enough stock for ${failure.productName}`,
          code: failure.error,
          product_id: failure.productId,
        },
        409,
      );
    case "TransactionFailure":
      return jsonResponse({ error: "Could not place order", code: failure.error }, 500);
  }
};

/**
 * POST /api/checkout
 */
const handleCheckout = (request: Request): Promise<Response> =>
  withUserBody(request, async (user, body) => {
    const result = await checkout(user.id, toCheckoutRequest(body));
    return result.ok ? jsonResponse({ order: result.order }, 201) : checkoutFailureResponse(result);
  });

/**
 * GET /api/orders/:id
 */
const handleOrderDetail = (request: Request, params: RouteParams): Promise<Response> =>
  requireUser(request, async (user) => {
    const id = parseId(params.id);
    const order = id === null ? null : await getOrderForUser(user.id, id);
    if (!order) {
      logError({ code: ErrorCode.NOT_FOUND_ORDER });
      return notFoundResponse();
    }
    return jsonResponse(order);
  });

/** Order routes */
export const orderRoutes = defineRoutes({
  "POST /api/checkout": (request) => handleCheckout(request),
  "GET /api/orders": (request) =>
    requireUser(request, async (user) => jsonResponse(await listOrdersForUser(user.id))),
  "GET /api/orders/:id": (request, params) => handleOrderDetail(request, params),
  "GET /api/dashboard": (request) =>
    requireUser(request, async (user) => {
      const { recentOrders, totalSpent } = await getOrderSummary(user.id);
      return jsonResponse({
        user: toPublicUser(user),
        recent_orders: recentOrders,
        total_spent: totalSpent,
      });
    }),
});
