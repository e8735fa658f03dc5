import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.mts"],
    // the logger relays to the parent port off the main thread
    pool: "forks",
    setupFiles: ["./vitest.setup.mts"],
  },
});
