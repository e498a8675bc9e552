import { defineConfig } from "vite";

// Builds the synchronizer as a single script the server-rendered page loads.
export default defineConfig({
  build: {
    outDir: "dist",
    lib: {
      entry: "src/main.ts",
      name: "StatusSync",
      formats: ["iife"],
      fileName: () => "status-sync.js",
    },
  },
});
