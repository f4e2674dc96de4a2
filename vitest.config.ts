import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["branchsum/test/**/*.test.ts"],
    environment: "node",
  },
});
