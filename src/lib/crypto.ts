/**
 * Cryptographic helpers built on Web Crypto
 *
 * Password hashes are PBKDF2-SHA256 stored as
 * pbkdf2:<iterations>:<base64 salt>:<base64 hash>
 */

import { randomInt, timingSafeEqual, webcrypto } from "node:crypto";
import { getEnv } from "#lib/env.ts";

const { subtle } = webcrypto;
const encoder = new TextEncoder();

const PBKDF2_ITERATIONS = 100_000;
const SALT_BYTES = 16;
const HASH_BITS = 256;

/** Tests set TEST_PBKDF2_ITERATIONS to keep hashing fast */
const getIterations = (): number => {
  const override = Number.parseInt(getEnv("TEST_PBKDF2_ITERATIONS") ?? "", 10);
  return Number.isInteger(override) && override > 0 ? override : PBKDF2_ITERATIONS;
};

const toBase64 = (bytes: Uint8Array): string => Buffer.from(bytes).toString("base64");

const fromBase64 = (value: string): Uint8Array => new Uint8Array(Buffer.from(value, "base64"));

const toHex = (buffer: ArrayBuffer): string => Buffer.from(buffer).toString("hex");

/** Random bytes from the platform CSPRNG */
export const randomBytes = (length: number): Uint8Array =>
  webcrypto.getRandomValues(new Uint8Array(length));

/** URL-safe random token */
export const generateSecureToken = (bytes = 32): string =>
  Buffer.from(randomBytes(bytes)).toString("base64url");

/** Compare two strings without short-circuiting on the first difference */
export const constantTimeEqual = (a: string, b: string): boolean => {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
};

const deriveHash = async (
  password: string,
  salt: Uint8Array,
  iterations: number,
): Promise<Uint8Array> => {
  const key = await subtle.importKey(
    "raw",
    encoder.encode(password),
    "PBKDF2",
    false,
    ["deriveBits"],
  );
  const bits = await subtle.deriveBits(
    { name: "PBKDF2", hash: "SHA-256", salt, iterations },
    key,
    HASH_BITS,
  );
  return new Uint8Array(bits);
};

/** Hash a password for storage */
export const hashPassword = async (password: string): Promise<string> => {
  const salt = randomBytes(SALT_BYTES);
  const iterations = getIterations();
  const hash = await deriveHash(password, salt, iterations);
  return `pbkdf2:${iterations}:${toBase64(salt)}:${toBase64(hash)}`;
};

/**
 * Check a password against a stored hash.
 * Malformed stored values never match.
 */
export const verifyPassword = async (
  storedHash: string,
  password: string,
): Promise<boolean> => {
  const [scheme, iterationsRaw, saltRaw, hashRaw] = storedHash.split(":");
  if (scheme !== "pbkdf2" || !iterationsRaw || !saltRaw || !hashRaw) return false;

  const iterations = Number.parseInt(iterationsRaw, 10);
  if (!Number.isInteger(iterations) || iterations <= 0) return false;

  const computed = await deriveHash(password, fromBase64(saltRaw), iterations);
  return constantTimeEqual(toBase64(computed), hashRaw);
};

/** SHA-256 hex digest (session token storage) */
export const sha256Hex = async (value: string): Promise<string> =>
  toHex(await subtle.digest("SHA-256", encoder.encode(value)));

/** HMAC-SHA256 hex signature (outbound webhook signing) */
export const hmacSha256Hex = async (secret: string, payload: string): Promise<string> => {
  const key = await subtle.importKey(
    "raw",
    encoder.encode(secret),
    { name: "HMAC", hash: "SHA-256" },
    false,
    ["sign"],
  );
  return toHex(await subtle.sign("HMAC", key, encoder.encode(payload)));
};

/** Uniform random integer in [min, max] */
export const randomIntInclusive = (min: number, max: number): number =>
  randomInt(min, max + 1);
