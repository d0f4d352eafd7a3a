import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (path: string): string =>
  fileURLToPath(new URL(`./src/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^#fp$/, replacement: src("fp/index.ts") },
      { find: /^#lib\/(.*)$/, replacement: src("lib/$1") },
      { find: /^#routes$/, replacement: src("routes/index.ts") },
      { find: /^#routes\/(.*)$/, replacement: src("routes/$1") },
      { find: /^#test-utils$/, replacement: src("test-utils/index.ts") },
      { find: /^#test-compat$/, replacement: src("test-utils/test-compat.ts") },
    ],
  },
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
  },
});
