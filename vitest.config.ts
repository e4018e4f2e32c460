import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    env: {
      CONSOLA_LEVEL: "1",
    },
  },
});
