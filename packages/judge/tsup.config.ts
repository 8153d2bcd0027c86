import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "tsup";

const packageDir = path.dirname(fileURLToPath(import.meta.url));

// Single-file executable; presets/ is read beside dist/ at run time.
export default defineConfig({
  entry: [path.join(packageDir, "src/pretool-judge.ts")],
  format: ["esm"],
  platform: "node",
  target: "node20",
  splitting: false,
  sourcemap: true,
  clean: true,
  dts: false,
  noExternal: ["@pretool-judge/core", "@pretool-judge/redaction"],
  external: ["yaml", "commander", "zod"],
  outDir: path.join(packageDir, "dist")
});
