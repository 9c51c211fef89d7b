import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    root: ".",
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      TENANT_ROOT_URL: "https://contoso.sharepoint.com",
      API_SECRET: "test-secret",
    },
    testTimeout: 10000,
  },
});
