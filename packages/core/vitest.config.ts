import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@planar/core",
    environment: "node",
  },
});
