import { defineConfig } from "vite";
import { fileURLToPath } from "node:url";

export default defineConfig({
  root: ".",
  build: {
    outDir: "dist",
    emptyOutDir: true,
    lib: {
      entry: fileURLToPath(new URL("./src/cover/index.ts", import.meta.url)),
      formats: ["es"],
      fileName: "exact-cover",
    },
  },
});
