import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["toolup/test/**/*.test.ts"],
    exclude: ["**/dist/**", "**/node_modules/**"],
  },
});
