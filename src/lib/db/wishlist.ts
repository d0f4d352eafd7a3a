/**
 * Wishlist operations
 */

import { execute, queryOne, queryRows } from "#lib/db/client.ts";
import type { Product } from "#lib/types.ts";

export type WishlistEntry = Pick<Product, "name" | "description" | "price" | "image_url"> & {
  product_id: number;
};

/**
 * Add a product to the user's wishlist.
 * `added` is false when it was already there.
 */
export const addToWishlist = async (
  userId: number,
  productId: number,
): Promise<{ ok: true; added: boolean } | { ok: false; error: "ProductNotFound" }> => {
  const product = await queryOne<{ id: number }>("SELECT id FROM products WHERE id = ?", [productId]);
  if (!product) return { ok: false, error: "ProductNotFound" };

  const inserted = await execute(
    "INSERT OR IGNORE INTO wishlist (user_id, product_id) VALUES (?, ?)",
    [userId, productId],
  );
  return { ok: true, added: inserted > 0 };
};

export const removeFromWishlist = async (
  userId: number,
  productId: number,
): Promise<{ ok: true } | { ok: false; error: "ItemNotFound" }> => {
  const removed = await execute(
    "DELETE FROM wishlist WHERE user_id = ? AND product_id = ?",
    [userId, productId],
  );
  return removed === 0 ? { ok: false, error: "ItemNotFound" } : { ok: true };
};

/** The user's wishlisted products in product id order */
export const getWishlist = (userId: number): Promise<WishlistEntry[]> =>
  queryRows<WishlistEntry>(
    `SELECT w.product_id, p.name, p.description, p.price, p.image_url
     FROM wishlist w
     JOIN products p ON w.product_id = p.id
     WHERE w.user_id = ?
     ORDER BY w.product_id`,
    [userId],
  );
