import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

// Centralized test config for root tests/*.test.ts.
export default defineConfig({
  resolve: {
    alias: {
      "@pretool-judge/core": path.join(rootDir, "packages/core/src/index.ts"),
      "@pretool-judge/redaction": path.join(rootDir, "packages/redaction/src/index.ts"),
      "@pretool-judge/judge": path.join(rootDir, "packages/judge/src/index.ts")
    }
  },
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node"
  }
});
