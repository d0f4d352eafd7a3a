/**
 * Test runner surface used by the test suite
 */

import { vi } from "vitest";

export { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

export const spyOn = vi.spyOn;
