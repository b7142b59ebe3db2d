import { defineConfig } from "vitest/config";
import { src_aliases } from "./vite.config";

export default defineConfig({
  define: {
    __DEV__: true,
  },
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    alias: src_aliases,
  },
});
