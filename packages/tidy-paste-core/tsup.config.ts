import { fileURLToPath } from "node:url";
import { defineConfig } from "tsup";

const resolve = (p: string) => fileURLToPath(new URL(p, import.meta.url));
const sourcemap = process.env.SOURCEMAP === "1" || process.env.SOURCEMAP === "true";

export default defineConfig({
  entry: [resolve("./src/index.ts")],
  dts: true,
  splitting: false,
  sourcemap,
  clean: true,
  format: ["esm", "cjs"],
  outDir: resolve("./dist"),
  target: "es2020",
  tsconfig: resolve("./tsconfig.build.json"),
  external: ["rehype-parse", "rehype-sanitize", "rehype-stringify", "unified"],
  outExtension({ format }) {
    return {
      js: format === "cjs" ? ".cjs" : ".mjs",
    };
  },
});
