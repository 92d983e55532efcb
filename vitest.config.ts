import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["astro/**/__tests__/**/*.test.ts", "natal/**/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
