import { defineConfig } from "vitest/config";

import { aliases } from "./vitest.aliases";

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
    env: {
      NODE_ENV: "test",
    },
    server: {
      deps: {
        inline: [/@warden\/.*/],
      },
    },
  },
});
