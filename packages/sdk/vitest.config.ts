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
      "@allotment/node": sibling("node"),
    },
  },
  test: {
    name: "sdk",
    include: ["tests/**/*.test.ts"],
  },
});
