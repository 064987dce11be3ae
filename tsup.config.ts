import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts", cli: "src/bin.ts" },
  format:   ["esm", "cjs"],
  // Declarations for the library entry only; cli is an executable.
  dts:      { entry: { index: "src/index.ts" } },
  clean:    true,
  // fs, crypto and stderr are used directly; not a browser build.
  platform: "node",
  target:   "node20",
});
