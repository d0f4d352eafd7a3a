/**
 * Cart operations
 *
 * One line per (user, product). Adding a product already in the cart
 * increments that line. Every mutation is scoped to the owning user,
 * so a line id belonging to someone else behaves as missing.
 * Stock is not checked here; checkout does that.
 */

import { map, sumBy } from "#fp";
import { execute, queryOne, queryRows } from "#lib/db/client.ts";
import { logDebug } from "#lib/logger.ts";
import type { CartLine } from "#lib/types.ts";

export type CartError = "ProductNotFound" | "LineNotFound" | "InvalidQuantity";

export type CartLineResult<E extends CartError> =
  | { ok: true; line: CartLine }
  | { ok: false; error: E };

/** Quantities are whole numbers of at least one */
export const isValidQuantity = (quantity: number): boolean =>
  Number.isInteger(quantity) && quantity >= 1;

/**
 * Add a product to a user's cart, merging with an existing line.
 */
export const addLine = async (
  userId: number,
  productId: number,
  quantity = 1,
): Promise<CartLineResult<"ProductNotFound" | "InvalidQuantity">> => {
  if (!isValidQuantity(quantity)) return { ok: false, error: "InvalidQuantity" };

  const product = await queryOne<{ id: number }>("SELECT id FROM products WHERE id = ?", [productId]);
  if (!product) return { ok: false, error: "ProductNotFound" };

  const line = await queryOne<CartLine>(
    `INSERT INTO cart (user_id, product_id, quantity) VALUES (?, ?, ?)
     ON CONFLICT (user_id, product_id) DO UPDATE SET quantity = quantity + excluded.quantity
     RETURNING *`,
    [userId, productId, quantity],
  );
  if (!line) throw new Error("Cart upsert returned no row");

  logDebug("Cart", `Line #${line.id} now has quantity ${line.quantity}`);
  return { ok: true, line };
};

/**
 * Set the quantity of one of the user's lines.
 */
export const setQuantity = async (
  userId: number,
  lineId: number,
  quantity: number,
): Promise<CartLineResult<"LineNotFound" | "InvalidQuantity">> => {
  if (!isValidQuantity(quantity)) return { ok: false, error: "InvalidQuantity" };

  const line = await queryOne<CartLine>(
    "UPDATE cart SET quantity = ? WHERE id = ? AND user_id = ? RETURNING *",
    [quantity, lineId, userId],
  );
  return line ? { ok: true, line } : { ok: false, error: "LineNotFound" };
};

/**
 * Remove one of the user's lines.
 */
export const removeLine = async (
  userId: number,
  lineId: number,
): Promise<{ ok: true } | { ok: false; error: "LineNotFound" }> => {
  const removed = await execute(
    "DELETE FROM cart WHERE id = ? AND user_id = ?",
    [lineId, userId],
  );
  return removed === 0 ? { ok: false, error: "LineNotFound" } : { ok: true };
};

/** A cart line priced at the current product price */
export type SnapshotLine = {
  lineId: number;
  productId: number;
  name: string;
  imageUrl: string | null;
  unitPrice: number;
  quantity: number;
  lineTotal: number;
  stock: number;
};

export type CartSnapshot = {
  lines: SnapshotLine[];
  total: number;
};

type SnapshotRow = {
  line_id: number;
  product_id: number;
  name: string;
  image_url: string | null;
  price: number;
  quantity: number;
  stock: number;
};

const toSnapshotLine = (row: SnapshotRow): SnapshotLine => ({
  lineId: row.line_id,
  productId: row.product_id,
  name: row.name,
  imageUrl: row.image_url,
  unitPrice: row.price,
  quantity: row.quantity,
  lineTotal: row.price * row.quantity,
  stock: row.stock,
});

/**
 * Price the user's cart: lines in ascending product id with line totals
 * and the cart total.
 */
export const snapshot = async (userId: number): Promise<CartSnapshot> => {
  const rows = await queryRows<SnapshotRow>(
    `SELECT c.id AS line_id, p.id AS product_id, p.name, p.image_url, p.price, c.quantity, p.stock
     FROM cart c
     JOIN products p ON c.product_id = p.id
     WHERE c.user_id = ?
     ORDER BY p.id`,
    [userId],
  );
  const lines = map(toSnapshotLine)(rows);
  return { lines, total: sumBy((l: SnapshotLine) => l.lineTotal)(lines) };
};
