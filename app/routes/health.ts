import { Router } from "express"
import { createHandler } from "@/lib/api/handler"
import { withRequest } from "@/lib/api/middleware"
import { isAgentReady } from "@/lib/ai/config"
import { getConfig } from "@/lib/config"

export const healthRouter = Router()

/**
 * GET /
 * Liveness plus whether analysis can run.
 */
healthRouter.get(
  "/",
  createHandler(withRequest, async () => ({
    timestamp: new Date().toISOString(),
    serverless: getConfig().serverless,
    agent_ready: isAgentReady(),
  }))
)
