import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@formpost/multipart": source("./packages/multipart/index.ts"),
      "@formpost/client": source("./packages/client/src/index.ts"),
    },
  },
  test: {
    include: ["packages/**/tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    environment: "node",
  },
});
