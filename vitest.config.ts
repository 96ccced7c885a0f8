import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@roamlink/core": pkg("core"),
      "@roamlink/client": pkg("client"),
      "@roamlink/memory": pkg("memory"),
      "@roamlink/redis-pubsub": pkg("redis-pubsub"),
    },
  },
  test: {
    include: ["packages/*/{src,test}/**/*.test.ts"],
    environment: "node",
  },
});
