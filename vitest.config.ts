import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "tests/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@helpdesk/types": path.resolve(root, "packages/types/src/index.ts"),
      "@helpdesk/core": path.resolve(root, "packages/core/src/index.ts"),
      "@helpdesk/runtime": path.resolve(root, "packages/runtime/src/index.ts"),
      "@helpdesk/persistence": path.resolve(root, "packages/persistence/src/index.ts"),
      "@helpdesk/tools": path.resolve(root, "packages/tools/src/index.ts"),
      "@helpdesk/support": path.resolve(root, "packages/support/src/index.ts"),
    },
  },
});
