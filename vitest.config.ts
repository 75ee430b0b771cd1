import { defineConfig } from "vitest/config"
import react from "@vitejs/plugin-react"
import path from "node:path"
import { fileURLToPath } from "node:url"

const root = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  plugins: [react()],
  resolve: {
    alias: {
      "@": root,
    },
  },
  test: {
    globals: true,
    // PGlite instances are per-file; keep memory bounded
    // (vitest only honours fileParallelism at the root config)
    fileParallelism: false,
    projects: [
      {
        extends: true,
        test: {
          name: "server",
          environment: "node",
          setupFiles: ["./test/setup.ts"],
          include: [
            "agents/**/*.test.ts",
            "app/**/*.test.ts",
            "db/**/*.test.ts",
            "inngest/**/*.test.ts",
            "lib/**/*.test.ts",
          ],
        },
      },
      {
        extends: true,
        test: {
          name: "web",
          environment: "jsdom",
          include: ["web/**/*.test.ts", "web/**/*.test.tsx"],
        },
      },
    ],
  },
})
