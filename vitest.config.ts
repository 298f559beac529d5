import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@skein/postcard": src("skein-postcard"),
      "@skein/wire": src("skein-wire"),
      "@skein/core": src("skein-core"),
      "@skein/tcp": src("skein-tcp"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
  },
});
