import { defineConfig } from "vitest/config";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

const src_dir = fileURLToPath(new URL("./src", import.meta.url));

export default defineConfig({
  define: {
    __DEV__: true,
  },
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    // bare imports such as "type_primitives" or "utils/error" resolve to src/<dir>
    alias: Object.fromEntries(
      fs
        .readdirSync(src_dir, { withFileTypes: true })
        .filter((dirent) => dirent.isDirectory())
        .map((dirent) => [dirent.name, path.resolve(src_dir, dirent.name)]),
    ),
  },
});
