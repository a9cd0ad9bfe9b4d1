import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "spanwire",
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
  },
});
