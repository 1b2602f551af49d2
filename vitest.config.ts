import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/api/tests/**/*.spec.ts", "packages/shared/src/**/*.spec.ts"],
    env: {
      NODE_ENV: "test",
    },
  },
});
