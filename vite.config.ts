import { defineConfig } from "vite"
import react from "@vitejs/plugin-react"
import path from "node:path"
import { fileURLToPath } from "node:url"

const root = path.dirname(fileURLToPath(import.meta.url))

const API_PATHS = [
  "/upload_regulation",
  "/regulations",
  "/check_compliance",
  "/compliance_checks",
  "/generate_report",
  "/generate_professional_report",
  "/download_report",
  "/report/",
  "/reports",
  "/monitor",
]

/** Dev server proxies API calls to the express backend on :8000. */
export default defineConfig({
  root: path.join(root, "web"),
  base: "/app/",
  plugins: [react()],
  resolve: {
    alias: {
      "@": root,
    },
  },
  server: {
    port: 5173,
    proxy: Object.fromEntries(
      API_PATHS.map((p) => [p, { target: "http://localhost:8000", changeOrigin: true }])
    ),
  },
  build: {
    outDir: path.join(root, "dist", "web"),
    emptyOutDir: true,
  },
})
