import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (relative: string): string =>
  fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Resolve workspace packages to their sources so vitest can follow their deps
      "@dailysync/shared": fromRoot("./packages/shared/src/index.ts"),
      "@dailysync/worker": fromRoot("./packages/worker/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    server: {
      deps: {
        inline: [/^@dailysync\//, "zod", "@google/genai", "neo4j-driver"],
      },
    },
  },
});
