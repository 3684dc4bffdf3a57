import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  test: {
    environment: "node",
    include: ["source/**/*.test.{ts,tsx}"],
    exclude: ["node_modules", "dist"],
  },
});
