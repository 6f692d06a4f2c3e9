import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pullstream/core",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
