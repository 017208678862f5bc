import { defineConfig } from "tsup";
import path from "path";
import fs from "fs";
import type { Plugin } from "esbuild";

const root = path.resolve("../..");

// Resolve @deduce/* imports to their TypeScript sources; workspace packages
// are never built on their own.
const resolveWorkspaceSource: Plugin = {
  name: "resolve-workspace-source",
  setup(build) {
    build.onResolve({ filter: /^@deduce\// }, (args) => {
      const name = args.path.replace("@deduce/", "");

      // Try packages/{name}/src/index.ts
      let srcPath = path.resolve(root, `packages/${name}/src/index.ts`);
      if (fs.existsSync(srcPath)) {
        return { path: srcPath };
      }

      // Try packages/games/{gameName}/src/index.ts (e.g. @deduce/game-minesweeper)
      if (name.startsWith("game-")) {
        srcPath = path.resolve(root, `packages/games/${name.replace("game-", "")}/src/index.ts`);
        if (fs.existsSync(srcPath)) {
          return { path: srcPath };
        }
      }

      return undefined;
    });
  },
};

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["cjs"],
  target: "node20",
  platform: "node",
  outDir: "dist",
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,

  // Bundle all workspace packages into the output
  noExternal: [/^@deduce\//],

  banner: {
    js: "#!/usr/bin/env node",
  },

  esbuildPlugins: [resolveWorkspaceSource],
});
