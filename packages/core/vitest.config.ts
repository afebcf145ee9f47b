import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@vecmat/core",
    globals: true,
    environment: "node",
  },
});
