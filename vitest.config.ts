import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["cidr-ts/**/*.test.ts"],
    server: {
      deps: {
        inline: ["@effect/vitest", "effect"],
      },
    },
  },
});
