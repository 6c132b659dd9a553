import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@shared": path.resolve(root, "shared"),
    },
  },
  test: {
    environment: "node",
    include: ["server/**/*.test.ts", "shared/**/*.test.ts"],
    env: {
      LOCAL_DB_PATH: ":memory:",
      ASAAS_API_KEY: "",
      ASAAS_WEBHOOK_TOKEN: "",
      ISSUANCE_RETRY_INTERVAL_MINUTES: "0",
    },
  },
});
