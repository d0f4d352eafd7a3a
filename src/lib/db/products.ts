/**
 * Products table operations and catalog reads
 *
 * Catalog reads never fail the request: a query error is logged and an
 * empty result returned so browsing stays up.
 */

import type { InValue } from "@libsql/client";
import { compact, map } from "#fp";
import { DEFAULT_PRODUCT_LIMIT } from "#lib/config.ts";
import { queryOne, queryRows } from "#lib/db/client.ts";
import { getReviewsForProduct, type ReviewWithAuthor } from "#lib/db/reviews.ts";
import { col, defineTable } from "#lib/db/table.ts";
import { ErrorCode, errorDetail, logError } from "#lib/logger.ts";
import type { Category, Product } from "#lib/types.ts";

/** Input type for creating a product (camelCase keys for table insert) */
export type ProductInput = {
  name: string;
  description?: string;
  price: number;
  stock?: number;
  imageUrl?: string | null;
  categoryId?: number | null;
  created?: string;
};

export const productsTable = defineTable<Product, ProductInput>({
  name: "products",
  primaryKey: "id",
  schema: {
    id: col.generated<number>(),
    name: col.simple<string>(),
    description: col.withDefault(() => ""),
    price: col.simple<number>(),
    stock: col.withDefault(() => 0),
    image_url: col.simple<string | null>(),
    category_id: col.simple<number | null>(),
    created: col.timestamp(),
  },
});

/** Input type for creating a category */
export type CategoryInput = {
  productType: string;
  ageGroup?: string | null;
  gender?: string | null;
};

export const categoriesTable = defineTable<Category, CategoryInput>({
  name: "categories",
  primaryKey: "id",
  schema: {
    id: col.generated<number>(),
    product_type: col.simple<string>(),
    age_group: col.simple<string | null>(),
    gender: col.simple<string | null>(),
  },
});

/** Run a catalog read, degrading to a fallback on failure */
export const readOrFallback = async <T>(
  code: (typeof ErrorCode)["CATALOG_SEARCH" | "CATALOG_RECOMMENDATIONS"],
  read: () => Promise<T>,
  fallback: T,
): Promise<T> => {
  try {
    return await read();
  } catch (error) {
    logError({ code, detail: errorDetail(error) });
    return fallback;
  }
};

/** Current stock for a product, null when the product does not exist */
export const currentStock = async (productId: number): Promise<number | null> => {
  const row = await queryOne<{ stock: number }>(
    "SELECT stock FROM products WHERE id = ?",
    [productId],
  );
  return row?.stock ?? null;
};

/** Home page listing: the first products in id order */
export const listProducts = (limit = DEFAULT_PRODUCT_LIMIT): Promise<Product[]> =>
  readOrFallback(
    ErrorCode.CATALOG_SEARCH,
    () => queryRows<Product>("SELECT * FROM products ORDER BY id LIMIT ?", [limit]),
    [],
  );

/** Category columns joined onto a product */
type CategoryColumns = {
  category_name: string | null;
  age_group: string | null;
  gender: string | null;
};

export type ProductDetail = Product & CategoryColumns & {
  reviews: ReviewWithAuthor[];
};

/** Product with its category and reviews, null when unknown */
export const getProductDetail = async (id: number): Promise<ProductDetail | null> => {
  const product = await queryOne<Product & CategoryColumns>(
    `SELECT p.*, c.product_type AS category_name, c.age_group AS age_group, c.gender AS gender
     FROM products p
     LEFT JOIN categories c ON p.category_id = c.id
     WHERE p.id = ?`,
    [id],
  );
  if (!product) return null;
  return { ...product, reviews: await getReviewsForProduct(id) };
};

export type SortOrder = "relevance" | "price_asc" | "price_desc" | "rating";

export const SORT_ORDERS: readonly SortOrder[] = ["relevance", "price_asc", "price_desc", "rating"];

export type SearchFilters = {
  query?: string;
  category?: string;
  gender?: string;
  ageGroup?: string;
  minPrice?: number;
  maxPrice?: number;
  sortBy?: SortOrder;
};

export type SearchResult = Product & CategoryColumns & {
  average_rating: number | null;
  review_count: number;
};

type Condition = { sql: string; args: InValue[] };

/** Escape LIKE wildcards in user input */
const likePattern = (text: string): string =>
  `%${text.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;

const searchConditions = (filters: SearchFilters): Condition[] =>
  compact<Condition>([
    !!filters.query && {
      sql: "(p.name LIKE ? ESCAPE '\\' OR p.description LIKE ? ESCAPE '\\')",
      args: [likePattern(filters.query), likePattern(filters.query)],
    },
    !!filters.category && { sql: "c.product_type = ?", args: [filters.category] },
    !!filters.gender && { sql: "c.gender = ?", args: [filters.gender] },
    !!filters.ageGroup && { sql: "c.age_group = ?", args: [filters.ageGroup] },
    filters.minPrice !== undefined && { sql: "p.price >= ?", args: [filters.minPrice] },
    filters.maxPrice !== undefined && { sql: "p.price <= ?", args: [filters.maxPrice] },
  ]);

const ORDER_BY: Record<SortOrder, string> = {
  relevance: "p.id DESC",
  price_asc: "p.price ASC, p.id DESC",
  price_desc: "p.price DESC, p.id DESC",
  rating: "average_rating DESC, p.id DESC",
};

/**
 * Search the catalog by keyword and category/price filters.
 * Results carry the average rating and review count.
 */
export const searchProducts = (filters: SearchFilters): Promise<SearchResult[]> => {
  const conditions = searchConditions(filters);
  const where = map((c: Condition) => ` AND ${c.sql}`)(conditions).join("");
  const args = conditions.flatMap((c) => c.args);

  return readOrFallback(
    ErrorCode.CATALOG_SEARCH,
    () =>
      queryRows<SearchResult>(
        `SELECT p.*,
           c.product_type AS category_name, c.age_group AS age_group, c.gender AS gender,
           AVG(pr.rating) AS average_rating,
           COUNT(pr.id) AS review_count
         FROM products p
         LEFT JOIN product_reviews pr ON p.id = pr.product_id
         LEFT JOIN categories c ON p.category_id = c.id
         WHERE 1=1${where}
         GROUP BY p.id
         ORDER BY ${ORDER_BY[filters.sortBy ?? "relevance"]}`,
        args,
      ),
    [],
  );
};

/** Distinct product types for the search filter */
export const getCategories = (): Promise<string[]> =>
  readOrFallback(
    ErrorCode.CATALOG_SEARCH,
    async () => {
      const rows = await queryRows<{ product_type: string }>(
        "SELECT DISTINCT product_type FROM categories ORDER BY product_type",
      );
      return map((r: { product_type: string }) => r.product_type)(rows);
    },
    [],
  );
