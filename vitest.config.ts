import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["motorcalc/**/*.test.ts"],
    environment: "node",
    watch: false,
  },
});
