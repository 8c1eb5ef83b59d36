import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const resolvePath = (relative: string): string =>
  fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    include: ["test/**/*.test.ts"],
    reporters: ["default"],
    coverage: {
      enabled: false,
    },
  },

  resolve: {
    alias: {
      "@/core": resolvePath("./src/lib/core"),
    },
  },
});
