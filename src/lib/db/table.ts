/**
 * Declarative table definitions
 *
 * A table is described by its columns; inserts take camelCase input keys
 * and map them onto snake_case columns, filling defaults and timestamps.
 */

import type { InValue } from "@libsql/client";
import { queryOne } from "#lib/db/client.ts";

/** How a column gets its value on insert */
export type ColumnDef<V> = {
  readonly generated: boolean;
  readonly fallback: (() => V) | null;
};

export const col = {
  /** Assigned by the database (autoincrement keys) */
  generated: <V>(): ColumnDef<V> => ({ generated: true, fallback: null }),
  /** Taken from input as-is, null when absent */
  simple: <V>(): ColumnDef<V> => ({ generated: false, fallback: null }),
  /** Taken from input, falling back to a default */
  withDefault: <V>(fallback: () => V): ColumnDef<V> => ({ generated: false, fallback }),
  /** ISO timestamp of insertion unless provided */
  timestamp: (): ColumnDef<string> => ({
    generated: false,
    fallback: () => new Date().toISOString(),
  }),
};

type Schema<Row> = { readonly [K in keyof Row]: ColumnDef<Row[K]> };

type TableConfig<Row> = {
  name: string;
  primaryKey: keyof Row & string;
  schema: Schema<Row>;
};

export type Table<Row, Input> = {
  readonly name: string;
  insert: (input: Input) => Promise<Row>;
  findById: (id: InValue) => Promise<Row | null>;
};

/** snake_case column name to its camelCase input key */
const toCamel = (column: string): string =>
  column.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());

/** Narrow an input value to something the driver can bind */
const toInValue = (column: string, value: unknown): InValue => {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean" ||
    value instanceof Uint8Array
  ) {
    return value;
  }
  throw new Error(`Unsupported value for column ${column}`);
};

/**
 * Define a table. Input keys are the camelCase forms of the column names.
 */
export const defineTable = <Row, Input extends Record<string, unknown>>(
  config: TableConfig<Row>,
): Table<Row, Input> => {
  const { name, primaryKey, schema } = config;
  const columns = Object.entries<ColumnDef<unknown>>(schema)
    .filter(([, def]) => !def.generated);

  const insert = async (input: Input): Promise<Row> => {
    const args = columns.map(([column, def]) => {
      const provided = input[toCamel(column)];
      const value = provided === undefined ? def.fallback?.() ?? null : provided;
      return toInValue(column, value);
    });
    const names = columns.map(([column]) => column).join(", ");
    const placeholders = columns.map(() => "?").join(", ");
    const row = await queryOne<Row>(
      `INSERT INTO ${name} (${names}) VALUES (${placeholders}) RETURNING *`,
      args,
    );
    if (!row) throw new Error(`Insert into ${name} returned no row`);
    return row;
  };

  const findById = (id: InValue): Promise<Row | null> =>
    queryOne<Row>(`SELECT * FROM ${name} WHERE ${primaryKey} = ?`, [id]);

  return { name, insert, findById };
};
