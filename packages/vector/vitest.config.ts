import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@vecmat/vector",
    globals: true,
    environment: "node",
  },
});
