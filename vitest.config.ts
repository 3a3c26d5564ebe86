import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],
    environment: "node",
    // probes against the local listener need a little headroom
    testTimeout: 10000,
  },
});
