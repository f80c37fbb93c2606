import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const webApp = fileURLToPath(new URL("./apps/web/app/", import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@\/app\//, replacement: webApp },
      { find: /^@\//, replacement: webApp }
    ]
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "packages/*/tests/**/*.test.ts", "apps/web/tests/**/*.test.ts"]
  }
});
