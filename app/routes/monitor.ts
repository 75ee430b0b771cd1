/**
 * @fileoverview Regulatory source monitoring
 * @module app/routes/monitor
 */

import { Router } from "express"
import { z } from "zod"
import { createMonitorSource, listMonitorSources } from "@/db/queries/monitoring"
import { listPayload, reply } from "@/lib/api-utils"
import { createHandler } from "@/lib/api/handler"
import { withInput, withRequest } from "@/lib/api/middleware"
import { runMonitor } from "@/lib/monitoring"
import { serializeMonitorSource } from "../serializers"

export const monitorSourceRequest = z.object({
  name: z.string().trim().min(1),
  url: z.string().url(),
  jurisdiction: z.string().trim().min(1).default("global"),
  regulation_type: z.string().trim().min(1).default("general"),
  // Query parameters arrive as strings
  due_days: z.coerce.number().int().positive().optional(),
})

export const monitorRouter = Router()

/**
 * POST /monitor/sources
 * Fields from query parameters or a JSON body.
 */
monitorRouter.post(
  "/monitor/sources",
  createHandler(withInput(monitorSourceRequest), async ({ input }) => {
    const source = await createMonitorSource({
      name: input.name,
      url: input.url,
      jurisdiction: input.jurisdiction,
      regulationType: input.regulation_type,
      dueDays: input.due_days ?? null,
    })
    return reply({ id: source.id }, "Source added")
  })
)

/**
 * GET /monitor/sources
 */
monitorRouter.get(
  "/monitor/sources",
  createHandler(withRequest, async () => {
    const sources = await listMonitorSources()
    return listPayload(sources.map(serializeMonitorSource))
  })
)

/**
 * POST /monitor/run
 * Checks every enabled source now.
 */
monitorRouter.post(
  "/monitor/run",
  createHandler(withRequest, async () => reply(await runMonitor(), "Monitor completed"))
)
