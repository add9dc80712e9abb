import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import { resolvePorts } from "./config/ports.js";

const { webHost, webPort, proxyApiPort } = resolvePorts();

export default defineConfig({
  plugins: [react()],
  server: {
    host: webHost,
    port: webPort,
    proxy: {
      "/api": {
        target: `http://127.0.0.1:${proxyApiPort}`,
        changeOrigin: true,
      },
    },
  },
});
