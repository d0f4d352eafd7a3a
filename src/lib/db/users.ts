/**
 * Users table operations: registration, lookup and profile updates
 */

import { hashPassword, verifyPassword } from "#lib/crypto.ts";
import { logActivity } from "#lib/db/activityLog.ts";
import { execute, queryOne } from "#lib/db/client.ts";
import { col, defineTable } from "#lib/db/table.ts";
import type { Gender, PublicUser, User } from "#lib/types.ts";

/** Input type for creating a user (camelCase keys for table insert) */
export type UserInput = {
  username: string;
  email: string;
  passwordHash: string;
  dob?: string | null;
  phoneNumber?: string | null;
  gender?: Gender | null;
};

export const usersTable = defineTable<User, UserInput>({
  name: "users",
  primaryKey: "id",
  schema: {
    id: col.generated<number>(),
    username: col.simple<string>(),
    email: col.simple<string>(),
    password_hash: col.simple<string>(),
    dob: col.simple<string | null>(),
    phone_number: col.simple<string | null>(),
    gender: col.simple<Gender | null>(),
    created: col.timestamp(),
  },
});

const GENDERS: readonly Gender[] = ["Male", "Female", "Other"];

const MAX_PHONE_DIGITS = 15;

/** Strip credential material before a user leaves the server */
export const toPublicUser = ({ password_hash: _, ...user }: User): PublicUser => user;

export const getUserById = (id: number): Promise<User | null> =>
  usersTable.findById(id);

export const getUserByUsername = (username: string): Promise<User | null> =>
  queryOne<User>("SELECT * FROM users WHERE username = ?", [username]);

/** Whether a username is already registered */
export const isUsernameTaken = async (username: string): Promise<boolean> =>
  (await getUserByUsername(username)) !== null;

/** Optional profile fields shared by registration and profile updates */
export type ProfileFields = {
  dob?: string | null;
  phoneNumber?: string | null;
  gender?: string | null;
};

export type ProfileFieldError = "InvalidDob" | "InvalidPhoneNumber" | "InvalidGender";

/** Check dob is a real YYYY-MM-DD calendar date */
const isValidDob = (dob: string): boolean => {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(dob)) return false;
  const date = new Date(`${dob}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(dob);
};

const isGender = (value: string): value is Gender =>
  GENDERS.some((gender) => gender === value);

type ValidProfile = { dob: string | null; phoneNumber: string | null; gender: Gender | null };

/** Validate optional profile fields; empty values become null */
export const validateProfileFields = (
  fields: ProfileFields,
): { ok: true; value: ValidProfile } | { ok: false; error: ProfileFieldError } => {
  const dob = fields.dob || null;
  const phoneNumber = fields.phoneNumber || null;
  const gender = fields.gender || null;

  if (dob !== null && !isValidDob(dob)) return { ok: false, error: "InvalidDob" };
  if (phoneNumber !== null && (!/^\d+$/.test(phoneNumber) || phoneNumber.length > MAX_PHONE_DIGITS)) {
    return { ok: false, error: "InvalidPhoneNumber" };
  }
  if (gender !== null && !isGender(gender)) return { ok: false, error: "InvalidGender" };

  return { ok: true, value: { dob, phoneNumber, gender } };
};

export type RegistrationInput = ProfileFields & {
  username: string;
  email: string;
  password: string;
};

export type RegistrationError =
  | "MissingRequiredField"
  | ProfileFieldError
  | "UsernameTaken"
  | "EmailTaken";

export type RegistrationResult =
  | { ok: true; user: User }
  | { ok: false; error: RegistrationError };

/**
 * Register a new user.
 * Duplicate usernames and emails are reported separately.
 */
export const registerUser = async (
  input: RegistrationInput,
): Promise<RegistrationResult> => {
  const { username, email, password } = input;
  if (!username || !email || !password) {
    return { ok: false, error: "MissingRequiredField" };
  }

  const profile = validateProfileFields(input);
  if (!profile.ok) return profile;

  const existing = await queryOne<Pick<User, "username" | "email">>(
    "SELECT username, email FROM users WHERE username = ? OR email = ? LIMIT 1",
    [username, email],
  );
  if (existing) {
    return { ok: false, error: existing.username === username ? "UsernameTaken" : "EmailTaken" };
  }

  const user = await usersTable.insert({
    username,
    email,
    passwordHash: await hashPassword(password),
    ...profile.value,
  });
  await logActivity(`User registered: #${user.id}`);
  return { ok: true, user };
};

export type ProfileUpdateInput = ProfileFields & {
  email: string;
  currentPassword?: string;
  newPassword?: string;
  confirmPassword?: string;
};

export type ProfileUpdateError =
  | "MissingRequiredField"
  | ProfileFieldError
  | "EmailTaken"
  | "IncorrectPassword"
  | "MissingNewPassword"
  | "PasswordMismatch"
  | "UserNotFound";

/**
 * Update contact details, and the password when the current one is supplied.
 */
export const updateProfile = async (
  userId: number,
  input: ProfileUpdateInput,
): Promise<{ ok: true; user: User } | { ok: false; error: ProfileUpdateError }> => {
  if (!input.email) return { ok: false, error: "MissingRequiredField" };

  const profile = validateProfileFields(input);
  if (!profile.ok) return profile;

  const user = await getUserById(userId);
  if (!user) return { ok: false, error: "UserNotFound" };

  const emailOwner = await queryOne<{ id: number }>(
    "SELECT id FROM users WHERE email = ? AND id != ?",
    [input.email, userId],
  );
  if (emailOwner) return { ok: false, error: "EmailTaken" };

  let passwordHash = user.password_hash;
  if (input.currentPassword) {
    if (!(await verifyPassword(user.password_hash, input.currentPassword))) {
      return { ok: false, error: "IncorrectPassword" };
    }
    if (!input.newPassword) return { ok: false, error: "MissingNewPassword" };
    if (input.newPassword !== input.confirmPassword) {
      return { ok: false, error: "PasswordMismatch" };
    }
    passwordHash = await hashPassword(input.newPassword);
  }

  const { dob, phoneNumber, gender } = profile.value;
  await execute(
    `UPDATE users SET email = ?, password_hash = ?, dob = ?, phone_number = ?, gender = ?
     WHERE id = ?`,
    [input.email, passwordHash, dob, phoneNumber, gender, userId],
  );

  return {
    ok: true,
    user: { ...user, email: input.email, password_hash: passwordHash, dob, phone_number: phoneNumber, gender },
  };
};
