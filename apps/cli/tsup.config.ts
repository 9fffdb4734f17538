import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: false,
  target: "node20",
  platform: "node",
  outDir: "dist",
  // Add shebang for CLI executable
  banner: {
    js: "#!/usr/bin/env node",
  },
  // Workspace packages ship TypeScript sources, so they are bundled
  noExternal: [/^@skiff\//],
});
