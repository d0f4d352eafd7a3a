/**
 * Test utilities for the storefront backend
 */

import { type Client, createClient } from "@libsql/client";
import { setDb } from "#lib/db/client.ts";
import { initDb } from "#lib/db/migrations/index.ts";
import { categoriesTable, type CategoryInput, productsTable, type ProductInput } from "#lib/db/products.ts";
import { saveSession } from "#lib/db/sessions.ts";
import { registerUser, type RegistrationInput } from "#lib/db/users.ts";
import { setEnv } from "#lib/env.ts";
import { type Mailer, setMailer } from "#lib/mailer.ts";
import type { Category, Product, SessionState, User } from "#lib/types.ts";
import { expect } from "#test-compat";

/** Default test user password */
export const TEST_PASSWORD = "test-password";

// ---------------------------------------------------------------------------
// Cached test database
// The in-memory client and its schema are reused across tests; each test
// starts from empty tables.
// ---------------------------------------------------------------------------

let cachedClient: Client | null = null;

/** Clear all data tables and reset autoincrement counters */
const clearDataTables = async (client: Client): Promise<void> => {
  // Disable FK checks so deletion order doesn't matter
  await client.execute("PRAGMA foreign_keys = OFF");
  const result = await client.execute(
    "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' AND name != 'settings'",
  );
  for (const row of result.rows) {
    await client.execute(`DELETE FROM ${String(row.name)}`);
  }
  // Reset autoincrement counters so IDs start from 1
  await client.execute(
    "DELETE FROM sqlite_sequence WHERE EXISTS (SELECT 1 FROM sqlite_master WHERE type='table' AND name='sqlite_sequence')",
  );
  await client.execute("PRAGMA foreign_keys = ON");
};

/** Check if the cached client's schema is still intact */
const isSchemaIntact = async (client: Client): Promise<boolean> => {
  try {
    await client.execute("SELECT 1 FROM settings LIMIT 1");
    return true;
  } catch {
    return false;
  }
};

/** Fast hashing and the Host the request helpers send */
const setupTestEnv = (): void => {
  setEnv("TEST_PBKDF2_ITERATIONS", "1");
  setEnv("ALLOWED_DOMAIN", "localhost");
};

/**
 * Point the app at an empty in-memory database.
 * Reuses the cached client and schema when possible.
 */
export const createTestDb = async (): Promise<void> => {
  setupTestEnv();

  if (cachedClient && await isSchemaIntact(cachedClient)) {
    setDb(cachedClient);
    await clearDataTables(cachedClient);
    return;
  }

  const client = createClient({ url: ":memory:" });
  cachedClient = client;
  setDb(client);
  await initDb();
};

/**
 * Reset the database connection and mailer.
 * Does NOT destroy the cached client; the next test reuses it.
 */
export const resetDb = (): void => {
  setDb(null);
  setMailer(null);
};

/**
 * Forget the cached client.
 * Call this when a test intentionally destroys the schema (e.g. resetDatabase).
 */
export const invalidateTestDbCache = (): void => {
  cachedClient = null;
};

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

let testUserCounter = 0;

/** Register a user with sensible defaults */
export const createTestUser = async (
  overrides: Partial<RegistrationInput> = {},
): Promise<User> => {
  testUserCounter++;
  const result = await registerUser({
    username: `user${testUserCounter}`,
    email: `user${testUserCounter}@example.com`,
    password: TEST_PASSWORD,
    ...overrides,
  });
  if (!result.ok) throw new Error(`createTestUser failed: ${result.error}`);
  return result.user;
};

let testProductCounter = 0;

/** Create a product with sensible defaults (price 1000, stock 10) */
export const createTestProduct = (
  overrides: Partial<ProductInput> = {},
): Promise<Product> => {
  testProductCounter++;
  return productsTable.insert({
    name: `Test Product ${testProductCounter}`,
    price: 1000,
    stock: 10,
    ...overrides,
  });
};

/** Create a category */
export const createTestCategory = (
  overrides: Partial<CategoryInput> = {},
): Promise<Category> =>
  categoriesTable.insert({ productType: "Shirts", ...overrides });

// ---------------------------------------------------------------------------
// Mail
// ---------------------------------------------------------------------------

export type SentMail = { to: string; subject: string; body: string };

/** Install a mailer that records messages instead of sending them */
export const useRecordingMailer = (): SentMail[] => {
  const sent: SentMail[] = [];
  const mailer: Mailer = {
    send(to, subject, body) {
      sent.push({ to, subject, body });
      return Promise.resolve();
    },
  };
  setMailer(mailer);
  return sent;
};

/** Install a mailer whose every send fails */
export const useFailingMailer = (): void => {
  setMailer({ send: () => Promise.reject(new Error("mail down")) });
};

/** Six-digit code from the last mail recorded */
export const lastOtpCode = (sent: readonly SentMail[]): string => {
  const match = sent.at(-1)?.body.match(/code is: (\d{6})/);
  if (!match?.[1]) throw new Error("No login code mailed");
  return match[1];
};

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

/**
 * Create a mock Request object (Host: localhost)
 */
export const mockRequest = (path: string, options: RequestInit = {}): Request => {
  const headers = new Headers(options.headers);
  headers.set("host", "localhost");
  return new Request(`http://localhost${path}`, { ...options, headers });
};

/** JSON request with an optional session cookie */
export const jsonRequest = (
  method: string,
  path: string,
  body?: unknown,
  cookie?: string,
): Request =>
  mockRequest(path, {
    method,
    headers: {
      "content-type": "application/json",
      ...(cookie ? { cookie } : {}),
    },
    body: body === undefined ? undefined : JSON.stringify(body),
  });

/** GET with an optional session cookie */
export const getRequest = (path: string, cookie?: string): Request =>
  mockRequest(path, cookie ? { headers: { cookie } } : {});

/** "name=value" part of a Set-Cookie header */
export const cookieFrom = (response: Response): string =>
  (response.headers.get("set-cookie") ?? "").split(";")[0] ?? "";

/**
 * Store a session in the given state and return its cookie,
 * skipping the login flow.
 */
export const sessionCookieFor = async (
  state: SessionState,
  token = `test-token-${Math.random().toString(36).slice(2)}`,
): Promise<string> => {
  await saveSession(token, state);
  return `__Host-session=${token}`;
};

/** Cookie for a logged-in session of the user */
export const loginAs = (user: Pick<User, "id">): Promise<string> =>
  sessionCookieFor({ status: "authenticated", userId: user.id });

// ---------------------------------------------------------------------------
// FP-style curried assertion helpers
// ---------------------------------------------------------------------------

/** Assert a result object has ok:false with the expected error string. */
export const expectResultError =
  (expectedError: string) =>
  <T extends { ok: boolean; error?: string }>(result: T): T => {
    expect(result.ok).toBe(false);
    if (!result.ok && "error" in result) {
      expect(result.error).toBe(expectedError);
    }
    return result;
  };
