/**
 * @fileoverview Regulation Data Access Layer
 *
 * A regulation row is created with status `processing` as soon as the upload
 * is accepted; the background function fills in the extracted text and the
 * analysis and moves it to `processed` (or `error`).
 *
 * @module db/queries/regulations
 */

import { desc, eq } from "drizzle-orm"
import type { RegulationAnalysis } from "@/agents/types"
import type { TokenUsage } from "@/lib/ai/budget"
import { db } from "../client"
import { regulations, type NewRegulation, type Regulation } from "../schema/regulations"
import { isUuid } from "./utils"

export async function createRegulation(values: NewRegulation): Promise<Regulation> {
  const [regulation] = await db.insert(regulations).values(values).returning()
  return regulation
}

export async function getRegulationById(regulationId: string): Promise<Regulation | null> {
  if (!isUuid(regulationId)) return null

  const [regulation] = await db
    .select()
    .from(regulations)
    .where(eq(regulations.id, regulationId))
    .limit(1)

  return regulation ?? null
}

/**
 * All regulations, newest upload first.
 */
export async function listRegulations(): Promise<Regulation[]> {
  return db.select().from(regulations).orderBy(desc(regulations.uploadDate))
}

export async function updateRegulationFilePath(
  regulationId: string,
  filePath: string
): Promise<void> {
  await db.update(regulations).set({ filePath }).where(eq(regulations.id, regulationId))
}

export async function saveExtractedText(
  regulationId: string,
  extractedText: string
): Promise<void> {
  await db.update(regulations).set({ extractedText }).where(eq(regulations.id, regulationId))
}

/**
 * Store the analysis and mark the regulation ready for compliance checks.
 * The extracted text is already on the row.
 */
export async function markRegulationProcessed(
  regulationId: string,
  result: {
    analysisResult: RegulationAnalysis
    tokenUsage?: TokenUsage | null
  }
): Promise<Regulation | null> {
  const [regulation] = await db
    .update(regulations)
    .set({
      analysisResult: result.analysisResult,
      tokenUsage: result.tokenUsage ?? null,
      status: "processed",
      errorMessage: null,
      filePath: "",
    })
    .where(eq(regulations.id, regulationId))
    .returning()

  return regulation ?? null
}

export async function markRegulationFailed(
  regulationId: string,
  errorMessage: string
): Promise<void> {
  await db
    .update(regulations)
    .set({ status: "error", errorMessage })
    .where(eq(regulations.id, regulationId))
}
