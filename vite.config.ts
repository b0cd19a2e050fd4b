import { defineConfig, type Plugin } from "vite";
import dts from "vite-plugin-dts";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

const src_dir = fileURLToPath(new URL("./src", import.meta.url));

/**
 * Replace __DEV__ with a runtime process.env check so consumers'
 * bundlers can strip the contract checks from production builds.
 */
function replace_dev_flag(): Plugin {
  return {
    name: "replace-dev-flag",
    transform(code, id) {
      if (id.includes("node_modules")) return null;
      const result = code.replace(
        /\b__DEV__\b/g,
        'process.env.NODE_ENV !== "production"',
      );
      return result !== code ? result : null;
    },
  };
}

export default defineConfig(({ command }) => ({
  plugins:
    command === "build"
      ? [replace_dev_flag(), dts({ tsconfigPath: "./tsconfig.build.json" })]
      : [],

  define: command === "build" ? {} : { __DEV__: "true" },

  resolve: {
    alias: Object.fromEntries(
      fs
        .readdirSync(src_dir, { withFileTypes: true })
        .filter((dirent) => dirent.isDirectory())
        .map((dirent) => [dirent.name, path.resolve(src_dir, dirent.name)]),
    ),
  },

  build: {
    target: "es2022",
    lib: {
      entry: path.resolve(src_dir, "index.ts"),
      formats: ["es", "cjs"],
      fileName: (format) => (format === "es" ? "index.js" : "index.cjs"),
    },
  },
}));
