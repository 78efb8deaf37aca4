import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      {
        extends: "./vitest.shared.ts",
        test: {
          name: "primitives",
          include: ["packages/**/src/**/*.test.ts"],
        },
      },
      {
        extends: "./vitest.shared.ts",
        test: {
          name: "collector",
          include: ["services/**/src/**/*.test.ts"],
        },
      },
    ],
  },
});
