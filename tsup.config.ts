import { defineConfig } from "tsup";

export default defineConfig({
  entry: { shipctl: "src/cli.ts" },
  format: ["cjs"],
  target: "node20",
  platform: "node",
  clean: true,
  sourcemap: true,
  minify: false,
  splitting: false,
  shims: false,
  outDir: "dist"
});
