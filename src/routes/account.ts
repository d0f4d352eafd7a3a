/**
 * Profile routes
 */

import { type ProfileUpdateError, toPublicUser, updateProfile } from "#lib/db/users.ts";
import { defineRoutes } from "#routes/router.ts";
import { jsonResponse, requireUser, stringField, withUserBody } from "#routes/utils.ts";

const PROFILE_ERRORS: Record<ProfileUpdateError, [string, number]> = {
  MissingRequiredField: ["Email is required", 400],
  InvalidDob: ["Date of birth must be YYYY-MM-DD", 400],
  InvalidPhoneNumber: ["Phone number must be up to 15 digits", 400],
  InvalidGender: ["Gender must be Male, Female or Other", 400],
  EmailTaken: ["Email already registered", 409],
  IncorrectPassword: ["Current password is incorrect", 400],
  MissingNewPassword: ["New password is required", 400],
  PasswordMismatch: ["New passwords do not match", 400],
  UserNotFound: ["User not found", 404],
};

/**
 * POST /api/profile
 */
const handleUpdateProfile = (request: Request): Promise<Response> =>
  withUserBody(request, async (user, body) => {
    const result = await updateProfile(user.id, {
      email: stringField(body, "email")?.trim() ?? "",
      dob: stringField(body, "dob"),
      phoneNumber: stringField(body, "phone_number"),
      gender: stringField(body, "gender"),
      currentPassword: stringField(body, "current_password"),
      newPassword: stringField(body, "new_password"),
      confirmPassword: stringField(body, "confirm_password"),
    });
    if (!result.ok) {
      const [message, status] = PROFILE_ERRORS[result.error];
      return jsonResponse({ error: message, code: result.error }, status);
    }
    return jsonResponse({ user: toPublicUser(result.user) });
  });

/** Account routes */
export const accountRoutes = defineRoutes({
  "GET /api/profile": (request) =>
    requireUser(request, (user) => Promise.resolve(jsonResponse({ user: toPublicUser(user) }))),
  "POST /api/profile": (request) => handleUpdateProfile(request),
});
