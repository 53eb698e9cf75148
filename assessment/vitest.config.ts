import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "assessment",
    environment: "node",
    include: ["src/**/*.test.ts"],
    fileParallelism: false,
  },
});
