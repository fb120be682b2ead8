import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "happy-dom",
    globals: true,
    include: ["packages/@lumen/*/tests/**/*.spec.ts"],
    testTransformMode: {
      ssr: ["**/packages/@lumen/compiler/tests/**"],
    },
  },
});
