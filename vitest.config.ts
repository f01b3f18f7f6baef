// vitest.config.ts
// Test runner configuration

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // COVENANT_* values from .env files, visible to tests through process.env
  const env = loadEnv(mode, process.cwd(), "COVENANT_");

  return {
    test: {
      env,
      pool: "threads",
      include: ["test/**/*.spec.ts"],
    },
  };
});
