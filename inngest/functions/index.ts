/**
 * @fileoverview Inngest Function Registry
 *
 * The serve handler imports from this file to register all functions.
 * The monitor cron is not registered on serverless runtimes.
 *
 * @module inngest/functions
 */

import { getConfig } from "@/lib/config"
import { processRegulation } from "./process-regulation"
import { monitorSources } from "./monitor-sources"

export function getFunctions(serverless: boolean = getConfig().serverless) {
  return serverless ? [processRegulation] : [processRegulation, monitorSources]
}
