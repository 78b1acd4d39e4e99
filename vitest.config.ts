import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: { "@": fileURLToPath(new URL("./src", import.meta.url)) },
  },
  css: { postcss: {} },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
