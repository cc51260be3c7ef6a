import { defineConfig } from "vitest/config";

export default defineConfig({
  // Tests must not pick up local `.env` files with real tokens.
  envDir: ".vitest-env",
  test: {
    pool: "threads",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "dist/**"],
  },
});
