import { defineConfig } from "tsup";

// Packaged ESM + CJS bundles; `npm run build` emits the plain tsc output to dist/.
export default defineConfig({
  entry: {
    index: "src/index.ts",
    langchain: "src/adapters/langchain.ts",
    "vercel-ai": "src/adapters/vercel-ai.ts",
  },
  outDir: "dist/bundle",
  format: ["esm", "cjs"],
  target: "node20",
  dts: true,
  clean: true,
  sourcemap: true,
});
