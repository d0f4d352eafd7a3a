/**
 * Product reviews
 */

import { execute, queryOne, queryRows } from "#lib/db/client.ts";
import type { Review } from "#lib/types.ts";

/** Review joined with its author's username */
export type ReviewWithAuthor = Pick<Review, "rating" | "review_text" | "created_at"> & {
  username: string;
};

/** Reviews for a product, newest first */
export const getReviewsForProduct = (productId: number): Promise<ReviewWithAuthor[]> =>
  queryRows<ReviewWithAuthor>(
    `SELECT r.review_text, r.rating, u.username, r.created_at
     FROM product_reviews r
     JOIN users u ON r.user_id = u.id
     WHERE r.product_id = ?
     ORDER BY r.created_at DESC, r.id DESC`,
    [productId],
  );

export type ReviewError = "ProductNotFound" | "InvalidReview";

/**
 * Submit a review. Rating must be a whole number from 1 to 5 and
 * the text must not be blank.
 */
export const submitReview = async (
  userId: number,
  productId: number,
  rating: number,
  text: string,
): Promise<{ ok: true } | { ok: false; error: ReviewError }> => {
  if (!Number.isInteger(rating) || rating < 1 || rating > 5 || !text.trim()) {
    return { ok: false, error: "InvalidReview" };
  }

  const product = await queryOne<{ id: number }>("SELECT id FROM products WHERE id = ?", [productId]);
  if (!product) return { ok: false, error: "ProductNotFound" };

  await execute(
    `INSERT INTO product_reviews (product_id, user_id, rating, review_text, created_at)
     VALUES (?, ?, ?, ?, ?)`,
    [productId, userId, rating, text.trim(), new Date().toISOString()],
  );
  return { ok: true };
};
