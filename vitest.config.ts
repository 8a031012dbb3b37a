import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    setupFiles: [path.resolve(root, "vitest.setup.ts")],
    include: ["packages/*/__tests__/**/*.test.ts"],
    testTimeout: 10000,
  },
});
