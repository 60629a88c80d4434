import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/server.ts"],
  format: ["esm"],
  dts: false, // tsc checks types; the exports point types at src
  clean: true,
  sourcemap: true,
});
