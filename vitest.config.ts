import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const packages = ["types", "core"];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@stakeline/${pkg}`] = fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: { alias },
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: { LOG_LEVEL: "silent" },
  },
});
