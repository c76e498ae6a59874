import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@config": fromRoot("./src/config"),
      "@core": fromRoot("./src/core"),
      "@settings": fromRoot("./src/settings"),
      "@sky": fromRoot("./src/sky"),
    },
  },
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
  },
});
