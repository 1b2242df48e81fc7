import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"]
  },
  resolve: {
    alias: {
      "@rankfile/shared": path.resolve(__dirname, "../shared/src/index.ts")
    }
  }
});
