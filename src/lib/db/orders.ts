/**
 * Order operations
 *
 * Checkout turns a user's cart into an order in a single write batch:
 * order row, items, stock decrements and cart deletion apply together
 * or not at all. The batch reads the cart and stock itself, so it acts
 * on the state at commit time rather than on the earlier snapshot.
 *
 * Stock can never go below zero: products.stock carries a CHECK
 * constraint, and a decrement past zero aborts the whole batch.
 */

import { randomUUID } from "node:crypto";
import type { InStatement } from "@libsql/client";
import { logActivity } from "#lib/db/activityLog.ts";
import { type SnapshotLine, snapshot } from "#lib/db/cart.ts";
import { isConstraintError, queryOne, queryRows, writeBatch } from "#lib/db/client.ts";
import { ErrorCode, errorDetail, logDebug, logError } from "#lib/logger.ts";
import type { Order, OrderItem, PaymentMode } from "#lib/types.ts";

export const DELIVERY_FIELDS = [
  "full_name",
  "address",
  "phone_number",
  "city",
  "postal_code",
] as const;

export type DeliveryField = (typeof DELIVERY_FIELDS)[number];

export type DeliveryInfo = Record<DeliveryField, string>;

export const PAYMENT_MODES: readonly PaymentMode[] = ["COD", "Card", "UPI"];

/** What the storefront submits at checkout */
export type CheckoutRequest = {
  delivery: Partial<Record<DeliveryField, string>>;
  paymentMode?: string;
  /** Card number for Card, UPI id for UPI; never stored */
  paymentDetail?: string;
};

export type PaymentDetailProblem = "UnknownPaymentMode" | "MissingCardNumber" | "MissingUpiId";

export type OrderItemWithName = OrderItem & { product_name: string };

export type OrderWithItems = Order & { items: OrderItemWithName[] };

export type CheckoutFailure =
  | { ok: false; error: "EmptyCart" }
  | { ok: false; error: "MissingDeliveryField"; field: DeliveryField }
  | { ok: false; error: "InvalidPaymentDetail"; problem: PaymentDetailProblem }
  | { ok: false; error: "InsufficientStock"; productId: number; productName: string }
  | { ok: false; error: "TransactionFailure" };

export type CheckoutResult = { ok: true; order: OrderWithItems } | CheckoutFailure;

const isPaymentMode = (value: string): value is PaymentMode =>
  PAYMENT_MODES.some((mode) => mode === value);

type ValidCheckout = { ok: true; delivery: DeliveryInfo; paymentMode: PaymentMode };

/**
 * Validate delivery details and the payment mode.
 * Payment mode defaults to cash on delivery.
 */
export const validateCheckoutRequest = (
  request: CheckoutRequest,
): ValidCheckout | CheckoutFailure => {
  const delivery: Partial<DeliveryInfo> = {};
  for (const field of DELIVERY_FIELDS) {
    const value = request.delivery[field]?.trim();
    if (!value) return { ok: false, error: "MissingDeliveryField", field };
    delivery[field] = value;
  }

  const mode = request.paymentMode || "COD";
  if (!isPaymentMode(mode)) {
    return { ok: false, error: "InvalidPaymentDetail", problem: "UnknownPaymentMode" };
  }
  const detail = request.paymentDetail?.trim();
  if (mode === "Card" && !detail) {
    return { ok: false, error: "InvalidPaymentDetail", problem: "MissingCardNumber" };
  }
  if (mode === "UPI" && !detail) {
    return { ok: false, error: "InvalidPaymentDetail", problem: "MissingUpiId" };
  }

  const { full_name, address, phone_number, city, postal_code } = delivery;
  if (!full_name || !address || !phone_number || !city || !postal_code) {
    return { ok: false, error: "MissingDeliveryField", field: "full_name" };
  }
  return {
    ok: true,
    delivery: { full_name, address, phone_number, city, postal_code },
    paymentMode: mode,
  };
};

/** First line (ascending product id) asking for more than is in stock */
const findShortfall = (lines: readonly SnapshotLine[]): SnapshotLine | undefined =>
  lines.find((line) => line.quantity > line.stock);

const insufficientStock = (line: SnapshotLine): CheckoutFailure => ({
  ok: false,
  error: "InsufficientStock",
  productId: line.productId,
  productName: line.name,
});

/**
 * Statements committing a checkout. Each reads the cart inside the
 * transaction; an empty cart inserts nothing at all.
 */
const checkoutStatements = (
  userId: number,
  reference: string,
  delivery: DeliveryInfo,
  paymentMode: PaymentMode,
  createdAt: string,
): InStatement[] => [
  {
    sql: `INSERT INTO orders (reference, user_id, total_price, payment_status, full_name,
            address, phone_number, city, postal_code, payment_mode, created_at)
          SELECT ?, ?,
            (SELECT SUM(p.price * c.quantity) FROM cart c
             JOIN products p ON p.id = c.product_id WHERE c.user_id = ?),
            'Pending', ?, ?, ?, ?, ?, ?, ?
          WHERE EXISTS (SELECT 1 FROM cart WHERE user_id = ?)`,
    args: [
      reference,
      userId,
      userId,
      delivery.full_name,
      delivery.address,
      delivery.phone_number,
      delivery.city,
      delivery.postal_code,
      paymentMode,
      createdAt,
      userId,
    ],
  },
  {
    sql: `INSERT INTO order_items (order_id, product_id, quantity, unit_price, price)
          SELECT o.id, c.product_id, c.quantity, p.price, p.price * c.quantity
          FROM cart c
          JOIN products p ON p.id = c.product_id
          JOIN orders o ON o.reference = ?
          WHERE c.user_id = ?
          ORDER BY c.product_id`,
    args: [reference, userId],
  },
  {
    sql: `UPDATE products
          SET stock = stock - (SELECT c.quantity FROM cart c
                               WHERE c.user_id = ? AND c.product_id = products.id)
          WHERE id IN (SELECT product_id FROM cart WHERE user_id = ?)`,
    args: [userId, userId],
  },
  {
    sql: "DELETE FROM cart WHERE user_id = ?",
    args: [userId],
  },
];

/**
 * Work out why a batch hit the stock constraint: another checkout took
 * the stock between our snapshot and commit.
 */
const diagnoseStockConflict = async (userId: number): Promise<CheckoutFailure> => {
  const { lines } = await snapshot(userId);
  const shortfall = findShortfall(lines);
  logError({ code: ErrorCode.CHECKOUT_STOCK_CONFLICT });
  return shortfall ? insufficientStock(shortfall) : { ok: false, error: "TransactionFailure" };
};

/**
 * Convert the user's cart into an order.
 */
export const checkout = async (
  userId: number,
  request: CheckoutRequest,
  now: number = Date.now(),
): Promise<CheckoutResult> => {
  const cart = await snapshot(userId);
  if (cart.lines.length === 0) return { ok: false, error: "EmptyCart" };

  const validation = validateCheckoutRequest(request);
  if (!validation.ok) return validation;

  const shortfall = findShortfall(cart.lines);
  if (shortfall) return insufficientStock(shortfall);

  const reference = randomUUID();
  const statements = checkoutStatements(
    userId,
    reference,
    validation.delivery,
    validation.paymentMode,
    new Date(now).toISOString(),
  );

  let orderInserted: boolean;
  try {
    const [orderInsert] = await writeBatch(statements);
    orderInserted = (orderInsert?.rowsAffected ?? 0) > 0;
  } catch (error) {
    if (isConstraintError(error, "CHECK")) return diagnoseStockConflict(userId);
    logError({ code: ErrorCode.DB_TRANSACTION, detail: errorDetail(error) });
    return { ok: false, error: "TransactionFailure" };
  }

  // Cart emptied by a concurrent checkout between snapshot and commit
  if (!orderInserted) return { ok: false, error: "EmptyCart" };

  const order = await getOrderByReference(reference);
  if (!order) {
    logError({ code: ErrorCode.NOT_FOUND_ORDER, detail: "missing after commit" });
    return { ok: false, error: "TransactionFailure" };
  }

  await logActivity(`Order placed: #${order.id}`);
  logDebug("Checkout", `Order #${order.id} placed with ${order.items.length} items`);
  return { ok: true, order };
};

/** Items of an order with product names, in product id order */
export const getOrderItems = (orderId: number): Promise<OrderItemWithName[]> =>
  queryRows<OrderItemWithName>(
    `SELECT oi.*, p.name AS product_name
     FROM order_items oi
     JOIN products p ON oi.product_id = p.id
     WHERE oi.order_id = ?
     ORDER BY oi.product_id`,
    [orderId],
  );

const withItems = async (order: Order | null): Promise<OrderWithItems | null> =>
  order ? { ...order, items: await getOrderItems(order.id) } : null;

const getOrderByReference = async (reference: string): Promise<OrderWithItems | null> =>
  withItems(await queryOne<Order>("SELECT * FROM orders WHERE reference = ?", [reference]));

/** An order with its items, only if it belongs to the user */
export const getOrderForUser = async (
  userId: number,
  orderId: number,
): Promise<OrderWithItems | null> =>
  withItems(
    await queryOne<Order>("SELECT * FROM orders WHERE id = ? AND user_id = ?", [orderId, userId]),
  );

/** The user's orders, newest first */
export const listOrdersForUser = (userId: number): Promise<Order[]> =>
  queryRows<Order>(
    "SELECT * FROM orders WHERE user_id = ? ORDER BY created_at DESC, id DESC",
    [userId],
  );

const RECENT_ORDER_COUNT = 5;

export type OrderSummary = {
  recentOrders: Order[];
  totalSpent: number;
};

/** Dashboard figures: most recent orders and lifetime spend */
export const getOrderSummary = async (userId: number): Promise<OrderSummary> => {
  const recentOrders = await queryRows<Order>(
    "SELECT * FROM orders WHERE user_id = ? ORDER BY created_at DESC, id DESC LIMIT ?",
    [userId, RECENT_ORDER_COUNT],
  );
  // Aggregate with COALESCE always returns a row
  const spent = await queryOne<{ total: number }>(
    "SELECT COALESCE(SUM(total_price), 0) AS total FROM orders WHERE user_id = ?",
    [userId],
  );
  return { recentOrders, totalSpent: spent?.total ?? 0 };
};
