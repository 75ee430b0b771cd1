/**
 * @fileoverview Scheduled Source Monitoring
 *
 * Runs a monitor pass every `MONITOR_INTERVAL_MINUTES`. Each source is
 * checked in its own step so a retry does not re-fetch sources that were
 * already handled.
 *
 * @module inngest/functions/monitor-sources
 */

import { getMonitorSourceById, listEnabledMonitorSources } from "@/db/queries/monitoring"
import { getConfig } from "@/lib/config"
import { checkSource } from "@/lib/monitoring"
import { inngest } from "../client"
import { CONCURRENCY, RETRY_CONFIG } from "../utils/concurrency"

export function monitorCron(intervalMinutes: number): string {
  return `*/${intervalMinutes} * * * *`
}

export const monitorSources = inngest.createFunction(
  {
    id: "monitor-sources",
    name: "Regulatory Source Monitor",
    concurrency: CONCURRENCY.monitor,
    retries: RETRY_CONFIG.monitor.retries,
  },
  { cron: monitorCron(getConfig().monitor.intervalMinutes) },
  async ({ step }) => {
    const sourceIds = await step.run("list-sources", async () => {
      const sources = await listEnabledMonitorSources()
      return sources.map((source) => source.id)
    })

    let changes = 0
    for (const sourceId of sourceIds) {
      const changed = await step.run(`check-source-${sourceId}`, async () => {
        const source = await getMonitorSourceById(sourceId)
        return source ? checkSource(source) : false
      })
      if (changed) changes++
    }

    return { changes, checked: sourceIds.length }
  }
)
