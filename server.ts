/**
 * HTTP server entry point. Sentry is initialised before anything else loads.
 */
import "./instrument"
import { fileURLToPath } from "node:url"
import { serve } from "inngest/express"
import { createApp } from "@/app/create-app"
import { initDb } from "@/db/migrate"
import { inngest } from "@/inngest/client"
import { getFunctions } from "@/inngest/functions"
import { getConfig } from "@/lib/config"
import { fmt, logger } from "@/lib/logger"

const config = getConfig()

await initDb()

const app = createApp({
  inngestHandler: serve({ client: inngest, functions: getFunctions() }),
  webDir: fileURLToPath(new URL("./dist/web", import.meta.url)),
})

app.listen(config.port, config.host, () => {
  console.log(`[server] Listening on http://${config.host}:${config.port}`)
  logger.info(fmt`Server started on port ${config.port}`, {
    serverless: config.serverless,
    agentReady: Boolean(config.geminiApiKey),
  })
})
