import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pullstream/stream",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
