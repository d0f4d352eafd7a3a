/**
 * Database migrations
 */

import { getDb } from "#lib/db/client.ts";
import { logDebug } from "#lib/logger.ts";

/**
 * The latest database update identifier - update this when changing schema
 */
export const LATEST_UPDATE = "add order item unit prices";

/**
 * Run a migration that may fail if already applied (e.g., adding a column that exists)
 */
const runMigration = async (sql: string): Promise<void> => {
  try {
    await getDb().execute(sql);
  } catch (error) {
    logDebug("Migration", `Skipped: ${String(error).split("\n")[0]}`);
  }
};

/**
 * Check if database is already up to date by reading from settings table
 */
const isDbUpToDate = async (): Promise<boolean> => {
  try {
    const result = await getDb().execute(
      "SELECT value FROM settings WHERE key = 'latest_db_update'",
    );
    return result.rows[0]?.value === LATEST_UPDATE;
  } catch {
    // settings table missing: fresh database
    return false;
  }
};

/**
 * Initialize database tables
 */
export const initDb = async (): Promise<void> => {
  // Per connection, so set even when the schema is current
  await getDb().execute("PRAGMA foreign_keys = ON");

  if (await isDbUpToDate()) {
    return;
  }

  await runMigration(`
    CREATE TABLE IF NOT EXISTS settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    )
  `);

  await runMigration(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT NOT NULL UNIQUE,
      email TEXT NOT NULL UNIQUE,
      password_hash TEXT NOT NULL,
      dob TEXT,
      phone_number TEXT,
      gender TEXT,
      created TEXT NOT NULL
    )
  `);

  // Append-only ledger; user_id is null when the username was unknown
  await runMigration(`
    CREATE TABLE IF NOT EXISTS login_attempts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER,
      username TEXT NOT NULL,
      attempted_at INTEGER NOT NULL
    )
  `);
  await runMigration(
    `CREATE INDEX IF NOT EXISTS idx_login_attempts_user ON login_attempts(user_id, attempted_at)`,
  );

  await runMigration(`
    CREATE TABLE IF NOT EXISTS sessions (
      token TEXT PRIMARY KEY,
      state TEXT NOT NULL,
      expires INTEGER NOT NULL
    )
  `);

  await runMigration(`
    CREATE TABLE IF NOT EXISTS categories (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      product_type TEXT NOT NULL,
      age_group TEXT,
      gender TEXT
    )
  `);

  await runMigration(`
    CREATE TABLE IF NOT EXISTS products (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      price INTEGER NOT NULL CHECK (price >= 0),
      stock INTEGER NOT NULL DEFAULT 0 CHECK (stock >= 0),
      image_url TEXT,
      category_id INTEGER REFERENCES categories(id),
      created TEXT NOT NULL
    )
  `);

  await runMigration(`
    CREATE TABLE IF NOT EXISTS product_reviews (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      product_id INTEGER NOT NULL REFERENCES products(id),
      user_id INTEGER NOT NULL REFERENCES users(id),
      rating INTEGER NOT NULL CHECK (rating BETWEEN 1 AND 5),
      review_text TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

  await runMigration(`
    CREATE TABLE IF NOT EXISTS cart (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL REFERENCES users(id),
      product_id INTEGER NOT NULL REFERENCES products(id),
      quantity INTEGER NOT NULL CHECK (quantity >= 1),
      UNIQUE (user_id, product_id)
    )
  `);

  await runMigration(`
    CREATE TABLE IF NOT EXISTS wishlist (
      user_id INTEGER NOT NULL REFERENCES users(id),
      product_id INTEGER NOT NULL REFERENCES products(id),
      PRIMARY KEY (user_id, product_id)
    )
  `);

  await runMigration(`
    CREATE TABLE IF NOT EXISTS orders (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      reference TEXT NOT NULL UNIQUE,
      user_id INTEGER NOT NULL REFERENCES users(id),
      total_price INTEGER NOT NULL,
      payment_status TEXT NOT NULL DEFAULT 'Pending',
      full_name TEXT NOT NULL,
      address TEXT NOT NULL,
      phone_number TEXT NOT NULL,
      city TEXT NOT NULL,
      postal_code TEXT NOT NULL,
      payment_mode TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);
  await runMigration(
    `CREATE INDEX IF NOT EXISTS idx_orders_user ON orders(user_id, created_at)`,
  );

  await runMigration(`
    CREATE TABLE IF NOT EXISTS order_items (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      order_id INTEGER NOT NULL REFERENCES orders(id),
      product_id INTEGER NOT NULL REFERENCES products(id),
      quantity INTEGER NOT NULL,
      price INTEGER NOT NULL
    )
  `);

  // Migration: per-unit snapshot alongside the line total
  await runMigration(
    `ALTER TABLE order_items ADD COLUMN unit_price INTEGER NOT NULL DEFAULT 0`,
  );

  await runMigration(`
    CREATE TABLE IF NOT EXISTS activity_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      created TEXT NOT NULL,
      message TEXT NOT NULL
    )
  `);

  // Update the version marker
  await getDb().execute({
    sql: "INSERT OR REPLACE INTO settings (key, value) VALUES ('latest_db_update', ?)",
    args: [LATEST_UPDATE],
  });
};

/**
 * All database tables in order for safe dropping (respects foreign key constraints)
 */
const ALL_TABLES = [
  "order_items",
  "orders",
  "wishlist",
  "cart",
  "product_reviews",
  "products",
  "categories",
  "sessions",
  "login_attempts",
  "activity_log",
  "users",
  "settings",
] as const;

/**
 * Reset the database by dropping all tables
 */
export const resetDatabase = async (): Promise<void> => {
  const client = getDb();
  for (const table of ALL_TABLES) {
    await client.execute(`DROP TABLE IF EXISTS ${table}`);
  }
};
