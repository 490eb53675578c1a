// vite.config.ts

import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import { apiPlugin } from "./functions/vitePlugin";

// Use relative asset paths so the app works at any subpath (e.g., /airdrop/)
const base = "./";

export default defineConfig({
  base,
  plugins: [react(), apiPlugin()],
  build: {
    outDir: "dist",
    chunkSizeWarningLimit: 1400,
  },
});
