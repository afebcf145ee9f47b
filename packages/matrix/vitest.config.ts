import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@vecmat/matrix",
    globals: true,
    environment: "node",
  },
});
