import path from "path";
import { defineConfig } from "vitest/config";

const packageSource = (name: string) => path.resolve(__dirname, "packages", name, "src/index.ts");

export default defineConfig({
  resolve: {
    alias: {
      "@gpufleet/adapters-common": packageSource("adapters-common"),
      "@gpufleet/adapters-gcp": packageSource("adapters-gcp"),
      "@gpufleet/core": packageSource("core"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
  },
});
