import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    // Workspace packages resolve to their TypeScript sources; no build needed before tests.
    alias: [
      { find: /^@luahint\/analyzer$/, replacement: path.join(root, "packages/analyzer/src/index.ts") },
      { find: /^@luahint\/language-server\/api$/, replacement: path.join(root, "packages/language-server/src/api.ts") },
    ],
  },
});
