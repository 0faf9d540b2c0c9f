import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "demo",
    globals: true,
    environment: "node",
    pool: 'forks',
  },
  resolve: {
    alias: {
      "@offload/tasks": new URL('../tasks/src/index.ts', import.meta.url).pathname,
    },
  },
});
