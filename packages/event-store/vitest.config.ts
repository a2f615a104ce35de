import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

function sibling(name: string): string {
  return fileURLToPath(new URL(`../${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      "@allotment/types": sibling("types"),
    },
  },
  test: {
    name: "event-store",
    include: ["tests/**/*.test.ts"],
  },
});
