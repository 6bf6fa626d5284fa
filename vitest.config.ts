import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/__tests__/**/*.test.ts"],
    env: {
      HAR_TYPEGEN_LOG: "off",
    },
  },
});
