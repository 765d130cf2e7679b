import { fileURLToPath } from "node:url";
import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

const PORTAL_ORIGIN = "https://api.portaldatransparencia.gov.br";

export default defineConfig({
  root: "web",
  envDir: fileURLToPath(new URL(".", import.meta.url)),
  plugins: [react()],
  css: {
    postcss: fileURLToPath(new URL(".", import.meta.url)),
  },
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./web/src", import.meta.url)),
    },
  },
  server: {
    // The portal sends no CORS headers, so the browser talks to it through the dev proxy.
    proxy: {
      "/api-de-dados": {
        target: PORTAL_ORIGIN,
        changeOrigin: true,
      },
    },
  },
  build: {
    outDir: fileURLToPath(new URL("./dist", import.meta.url)),
    emptyOutDir: true,
  },
});
