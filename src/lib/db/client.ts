/**
 * Database client setup and core utilities
 */

import { type Client, createClient, type InStatement, type InValue, type ResultSet } from "@libsql/client";
import { lazyRef } from "#fp";
import { getEnv } from "#lib/env.ts";

const createDbClient = (): Client => {
  const url = getEnv("DB_URL");
  if (!url) {
    throw new Error("DB_URL environment variable is required");
  }
  return createClient({
    url,
    authToken: getEnv("DB_TOKEN"),
  });
};

const [dbGetter, dbSetter] = lazyRef(createDbClient);

/**
 * Get or create database client
 */
export const getDb = (): Client => dbGetter();

/**
 * Set database client (for testing)
 */
export const setDb = (client: Client | null): void => dbSetter(client);

/** Query single row, returning null if not found */
export const queryOne = async <T>(
  sql: string,
  args: InValue[] = [],
): Promise<T | null> => {
  const result = await getDb().execute({ sql, args });
  return result.rows.length === 0 ? null : result.rows[0] as unknown as T;
};

/** Query multiple rows with typed result */
export const queryRows = async <T>(
  sql: string,
  args: InValue[] = [],
): Promise<T[]> => {
  const result = await getDb().execute({ sql, args });
  return result.rows as unknown as T[];
};

/** Execute a single write statement, returning rows affected */
export const execute = async (
  sql: string,
  args: InValue[] = [],
): Promise<number> => {
  const result = await getDb().execute({ sql, args });
  return result.rowsAffected;
};

/**
 * Run statements as one atomic write transaction.
 * Either every statement applies or none do; a failing statement
 * rolls the whole batch back and rethrows.
 */
export const writeBatch = (statements: InStatement[]): Promise<ResultSet[]> =>
  getDb().batch(statements, "write");

/** True when a thrown database error is a violated constraint of the given kind */
export const isConstraintError = (
  error: unknown,
  kind: "CHECK" | "UNIQUE" | "FOREIGN KEY",
): boolean => String(error).includes(`${kind} constraint failed`);
