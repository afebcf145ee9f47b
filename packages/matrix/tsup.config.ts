import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/mat2.ts", "src/mat3.ts"],
  format: ["cjs", "esm"],
  dts: true,
  sourcemap: true,
  clean: true,
  external: ["@vecmat/core", "@vecmat/vector"],
});
