import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const fromRoot = (dir: string): string =>
  fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    include: ["src/tests/**/*.test.ts"],
    env: {
      LOG_LEVEL: "error",
      LOG_FILE: "off",
    },
  },
  resolve: {
    alias: {
      "@config": fromRoot("./src/config"),
      "@domain": fromRoot("./src/domain"),
      "@app": fromRoot("./src/app"),
      "@infrastructure": fromRoot("./src/infrastructure"),
      "@interfaces": fromRoot("./src/interfaces"),
      "@middleware": fromRoot("./src/middleware"),
      "@routes": fromRoot("./src/routes"),
      "@utils": fromRoot("./src/utils"),
    },
  },
});
