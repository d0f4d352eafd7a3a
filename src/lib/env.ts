/**
 * Environment variable access
 *
 * Single seam over process.env so tests can set and clear values
 * without the rest of the code touching the process object.
 */

/**
 * Get an environment variable value.
 * Empty strings are treated as unset.
 */
export const getEnv = (key: string): string | undefined => {
  const value = process.env[key];
  return value === "" ? undefined : value;
};

/** Set an environment variable (test setup) */
export const setEnv = (key: string, value: string): void => {
  process.env[key] = value;
};

/** Remove an environment variable (test teardown) */
export const deleteEnv = (key: string): void => {
  delete process.env[key];
};
