/**
 * @fileoverview Regulatory source monitor
 *
 * Fetches registered web sources and, when a page's content hash changes,
 * turns the content into an analysed regulation and records a new version.
 * The version is stored only after the analysis succeeds, so a failed run
 * is retried on the next check.
 *
 * @module lib/monitoring/source-monitor
 */

import { runRegulationAnalyst } from "@/agents/regulation-analyst"
import {
  createRegulation,
  createSourceVersion,
  getLatestSourceVersion,
  listEnabledMonitorSources,
} from "@/db/queries"
import type { MonitorSource } from "@/db/schema/monitoring"
import { BudgetTracker } from "@/lib/ai/budget"
import { getConfig } from "@/lib/config"
import { fmt, logger } from "@/lib/logger"
import { computeContentHash } from "@/lib/storage"

export const SNIPPET_LENGTH = 200
export const MONITOR_TEXT_LIMIT = 10_000

export interface MonitorRunResult {
  changes: number
  checked: number
}

/** Text of the first `<title>` element, if the body is HTML */
export function extractTitle(body: string): string | null {
  const match = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(body)
  const title = match?.[1].replace(/\s+/g, " ").trim()
  return title ? title : null
}

async function fetchSource(url: string): Promise<string> {
  const response = await fetch(url, {
    signal: AbortSignal.timeout(getConfig().monitor.fetchTimeoutMs),
  })
  if (!response.ok) {
    throw new Error(`GET ${url} returned ${response.status}`)
  }
  return response.text()
}

/**
 * Check one source.
 *
 * @returns true when new content was found and stored. Failures are logged
 *   and count as "no change".
 */
export async function checkSource(source: MonitorSource): Promise<boolean> {
  try {
    const body = await fetchSource(source.url)
    const hash = computeContentHash(body)

    const latest = await getLatestSourceVersion(source.id)
    if (latest?.hash === hash) return false

    const text = body.slice(0, MONITOR_TEXT_LIMIT)
    const budgetTracker = new BudgetTracker()
    const { analysis } = await runRegulationAnalyst({
      text,
      regulationType: source.regulationType,
      jurisdiction: source.jurisdiction,
      budgetTracker,
      agent: "monitorAnalyst",
    })

    const regulation = await createRegulation({
      fileName: `monitor_${source.name}.txt`,
      mimeType: "text/plain",
      regulationType: source.regulationType,
      jurisdiction: source.jurisdiction,
      extractedText: text,
      analysisResult: analysis,
      tokenUsage: budgetTracker.getUsage().total,
      status: "processed",
      sourceId: source.id,
    })
    await createSourceVersion({
      sourceId: source.id,
      hash,
      title: extractTitle(body),
      snippet: body.slice(0, SNIPPET_LENGTH),
      regulationId: regulation.id,
    })

    logger.info(fmt`Monitor source ${source.name} changed`, {
      sourceId: source.id,
      regulationId: regulation.id,
    })
    return true
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error("[monitor] Source check failed", { sourceId: source.id, url: source.url, message })
    logger.error(fmt`Monitor source ${source.name} failed`, { sourceId: source.id, error: message })
    return false
  }
}

/**
 * Check every enabled source in turn.
 */
export async function runMonitor(): Promise<MonitorRunResult> {
  const sources = await listEnabledMonitorSources()

  let changes = 0
  for (const source of sources) {
    if (await checkSource(source)) changes++
  }

  console.log(`[monitor] Checked ${sources.length} sources, ${changes} changed`)
  return { changes, checked: sources.length }
}
