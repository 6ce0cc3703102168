import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    // a few cases walk the whole 181,440-grid component
    testTimeout: 30000,
    include: ["src/**/__tests__/**/*.test.ts"],
  },
});
