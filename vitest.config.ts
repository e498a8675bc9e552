import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  test: {
    include: ["apps/*/src/**/*.test.{ts,tsx}"],
    environment: "node",
    restoreMocks: true,
  },
});
