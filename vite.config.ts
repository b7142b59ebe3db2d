import { defineConfig, type Plugin } from "vite";
import dts from "vite-plugin-dts";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

const root = path.dirname(fileURLToPath(import.meta.url));

/**
 * Swap __DEV__ for a NODE_ENV check in the published bundle, so dev-only
 * validation still runs for consumers and their bundlers can strip it.
 */
function replace_dev_globals(): Plugin {
  return {
    name: "replace-dev-globals",
    transform(code, id) {
      if (id.includes("node_modules")) return null;
      const result = code.replace(/\b__DEV__\b/g, 'process.env.NODE_ENV !== "production"');
      return result !== code ? result : null;
    },
  };
}

// top-level src directories double as bare import roots ("type_primitives", "utils/...")
export const src_aliases = Object.fromEntries(
  fs
    .readdirSync(path.resolve(root, "src"), { withFileTypes: true })
    .filter((dirent) => dirent.isDirectory() && !dirent.name.startsWith("__"))
    .map((dirent) => [dirent.name, path.resolve(root, `./src/${dirent.name}`)]),
);

export default defineConfig(({ command }) => ({
  plugins:
    command === "build"
      ? [replace_dev_globals(), dts({ tsconfigPath: "./tsconfig.build.json" })]
      : [],

  define: command === "build" ? {} : { __DEV__: "true" },

  resolve: {
    alias: src_aliases,
  },

  build: {
    target: "es2022",
    lib: {
      entry: path.resolve(root, "src/index.ts"),
      formats: ["es", "cjs"],
      fileName: (format) => (format === "es" ? "index.js" : "index.cjs"),
    },
  },
}));
