import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "tasks",
    globals: true,
    environment: "node",
    pool: 'forks',
    coverage: {
      reporter: ["text", "json", "html"],
    },
  },
  resolve: {
    alias: {
      "@offload/tasks": new URL('./src/index.ts', import.meta.url).pathname,
    },
  },
});
