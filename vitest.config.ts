import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["trajectory-renderer/tests/**/*.spec.ts"],
    environment: "node",
  },
});
