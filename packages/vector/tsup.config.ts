import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/vec2.ts", "src/vec3.ts"],
  format: ["cjs", "esm"],
  dts: true,
  sourcemap: true,
  clean: true,
  external: ["@vecmat/core"],
});
