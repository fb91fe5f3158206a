import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import { fileURLToPath } from "node:url";
import { createKevApi } from "./src/server/kevApi";
import { loadDatasetFile } from "./src/server/datasetFile";
import { resolveServerConfig } from "./src/server/config";

const config = resolveServerConfig(process.env);

export default defineConfig({
  plugins: [
    react(),
    {
      name: "kev-api-v1",
      configureServer(server) {
        // Parsed on first request, then served from memory
        server.middlewares.use(createKevApi(() => loadDatasetFile(config.csvPath)));
      },
    },
  ],
  build: {
    target: "es2020",
  },
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  server: {
    port: config.port,
  },
});
