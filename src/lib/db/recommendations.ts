/**
 * Product recommendations
 *
 * Three independent lists, each capped at ten products:
 * - bought by customers who bought something this user bought
 * - wishlisted by customers sharing a wishlisted product
 * - highest average rating overall
 * The first two exclude products the user already has.
 */

import { queryRows } from "#lib/db/client.ts";
import { readOrFallback } from "#lib/db/products.ts";
import { ErrorCode } from "#lib/logger.ts";
import type { Product } from "#lib/types.ts";

const RECOMMENDATION_LIMIT = 10;

export type RatedProduct = Product & { average_rating: number };

export type Recommendations = {
  fromPurchases: Product[];
  fromWishlist: Product[];
  topRated: RatedProduct[];
};

const PURCHASED_BY_USER = `
  SELECT oi.product_id FROM order_items oi
  JOIN orders o ON oi.order_id = o.id
  WHERE o.user_id = ?`;

const fromPurchases = (userId: number): Promise<Product[]> =>
  queryRows<Product>(
    `SELECT DISTINCT p.*
     FROM products p
     JOIN order_items oi ON p.id = oi.product_id
     JOIN orders o ON oi.order_id = o.id
     WHERE o.user_id IN (
       SELECT o2.user_id FROM orders o2
       JOIN order_items oi2 ON o2.id = oi2.order_id
       WHERE oi2.product_id IN (${PURCHASED_BY_USER})
     )
     AND p.id NOT IN (${PURCHASED_BY_USER})
     ORDER BY p.id
     LIMIT ?`,
    [userId, userId, RECOMMENDATION_LIMIT],
  );

const fromWishlist = (userId: number): Promise<Product[]> =>
  queryRows<Product>(
    `SELECT DISTINCT p.*
     FROM products p
     JOIN wishlist w ON p.id = w.product_id
     WHERE w.user_id IN (
       SELECT user_id FROM wishlist
       WHERE product_id IN (SELECT product_id FROM wishlist WHERE user_id = ?)
     )
     AND p.id NOT IN (SELECT product_id FROM wishlist WHERE user_id = ?)
     ORDER BY p.id
     LIMIT ?`,
    [userId, userId, RECOMMENDATION_LIMIT],
  );

const topRated = (): Promise<RatedProduct[]> =>
  queryRows<RatedProduct>(
    `SELECT p.*, AVG(pr.rating) AS average_rating
     FROM products p
     JOIN product_reviews pr ON p.id = pr.product_id
     GROUP BY p.id
     ORDER BY average_rating DESC, p.id
     LIMIT ?`,
    [RECOMMENDATION_LIMIT],
  );

/** All three lists; a failing list comes back empty */
export const getRecommendations = async (userId: number): Promise<Recommendations> => {
  const code = ErrorCode.CATALOG_RECOMMENDATIONS;
  const [purchases, wishlist, rated] = await Promise.all([
    readOrFallback(code, () => fromPurchases(userId), []),
    readOrFallback(code, () => fromWishlist(userId), []),
    readOrFallback(code, topRated, []),
  ]);
  return { fromPurchases: purchases, fromWishlist: wishlist, topRated: rated };
};
