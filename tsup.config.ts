import { defineConfig } from "tsup";

export default defineConfig([
  {
    entry: {
      index: "src/index.ts",
    },
    format: ["esm", "cjs"],
    dts: {
      compilerOptions: {
        skipLibCheck: true,
      },
    },
    sourcemap: true,
    clean: true,
    splitting: false,
    treeshake: true,
    external: ["node:fs", "node:fs/promises", "node:os", "node:path"],
  },
]);
