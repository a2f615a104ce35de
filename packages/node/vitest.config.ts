import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

function sibling(name: string): string {
  return fileURLToPath(new URL(`../${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      "@allotment/types": sibling("types"),
      "@allotment/budget": sibling("budget"),
      "@allotment/event-store": sibling("event-store"),
    },
  },
  test: {
    name: "node",
    include: ["tests/**/*.test.ts"],
  },
});
