import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

const backendOrigin = process.env.OUTFIT_FORGE_BACKEND_ORIGIN ?? "http://127.0.0.1:4810";

export default defineConfig({
  plugins: [react()],
  server: {
    port: 3000,
    host: "127.0.0.1",
    proxy: {
      "/api": {
        target: backendOrigin,
        changeOrigin: true,
      },
    },
  }
});
