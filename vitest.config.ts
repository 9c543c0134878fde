import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["admin/**/*.test.ts"],
    environment: "node",
    // sqlite3 is a native addon; keep each test file in its own process
    pool: "forks",
  },
});
