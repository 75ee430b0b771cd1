/**
 * @fileoverview Regulation Processing Function
 *
 * Turns an uploaded regulation into an analysed one:
 * extract text → delete upload → regulation analyst → persist
 *
 * The extract step writes the text to the regulation row and returns only
 * its metadata; Inngest caps the size of step output.
 *
 * Extraction failures (unsupported, corrupt, encrypted or empty documents)
 * end the run without retry. Analysis failures are retried; once retries
 * are exhausted the regulation is marked "Analysis failed".
 *
 * @module inngest/functions/process-regulation
 */

import { NonRetriableError } from "inngest"
import { runRegulationAnalyst } from "@/agents/regulation-analyst"
import {
  getRegulationById,
  markRegulationFailed,
  markRegulationProcessed,
  saveExtractedText,
} from "@/db/queries/regulations"
import { BudgetTracker } from "@/lib/ai/budget"
import { extractDocument, type ExtractionResult } from "@/lib/document-extraction"
import {
  CorruptDocumentError,
  EncryptedDocumentError,
  ValidationError,
} from "@/lib/errors"
import { deleteFile, fileExists, readStoredFile } from "@/lib/storage"
import { inngest } from "../client"
import { regulationUploadedPayload } from "../types"
import { CONCURRENCY, RETRY_CONFIG } from "../utils/concurrency"

export const ANALYSIS_FAILED_MESSAGE = "Analysis failed"

type ExtractionOutcome =
  | { ok: true; characters: number; pageCount: number; warnings: string[] }
  | { ok: false; message: string }

function isExtractionError(error: unknown): error is Error {
  return (
    error instanceof ValidationError ||
    error instanceof CorruptDocumentError ||
    error instanceof EncryptedDocumentError
  )
}

/**
 * Extract the upload and store its text on the regulation.
 *
 * Extraction errors are returned, not thrown, so the decision not to retry
 * survives step memoization.
 */
export async function extractUploadedText(
  regulationId: string,
  filePath: string,
  mimeType: string
): Promise<ExtractionOutcome> {
  if (!(await fileExists(filePath))) {
    return { ok: false, message: "Uploaded file not found" }
  }

  let result: ExtractionResult
  try {
    result = await extractDocument(await readStoredFile(filePath), mimeType)
  } catch (error) {
    if (isExtractionError(error)) return { ok: false, message: error.message }
    throw error
  }

  await saveExtractedText(regulationId, result.text)
  return {
    ok: true,
    characters: result.text.length,
    pageCount: result.pageCount,
    warnings: result.quality.warnings.map((warning) => warning.type),
  }
}

async function loadExtractedText(regulationId: string): Promise<string> {
  const regulation = await getRegulationById(regulationId)
  if (!regulation?.extractedText) {
    throw new Error(`Extracted text missing for regulation ${regulationId}`)
  }
  return regulation.extractedText
}

export const processRegulation = inngest.createFunction(
  {
    id: "process-regulation",
    name: "Regulation Analysis",
    concurrency: CONCURRENCY.analysis,
    retries: RETRY_CONFIG.analysis.retries,
    onFailure: async ({ event, error }) => {
      const { regulationId } = event.data.event.data
      const regulation = await getRegulationById(regulationId)

      // Extraction failures have already stored their own message
      if (regulation?.status !== "processing") return

      console.error("[process-regulation] Retries exhausted", {
        regulationId,
        error: error.message,
      })
      await markRegulationFailed(regulationId, ANALYSIS_FAILED_MESSAGE)
    },
  },
  { event: "regulation/uploaded" },
  async ({ event, step }) => {
    const payload = regulationUploadedPayload.parse(event.data)
    const { regulationId, filePath, mimeType, regulationType, jurisdiction } = payload

    const extraction = await step.run("extract-text", () =>
      extractUploadedText(regulationId, filePath, mimeType)
    )

    await step.run("delete-upload", () => deleteFile(filePath))

    if (!extraction.ok) {
      await step.run("mark-extraction-failed", () =>
        markRegulationFailed(regulationId, extraction.message)
      )
      throw new NonRetriableError(extraction.message)
    }

    console.log("[process-regulation] Extracted", {
      regulationId,
      characters: extraction.characters,
      pages: extraction.pageCount,
      warnings: extraction.warnings,
    })

    const analysis = await step.run("analyze-regulation", async () => {
      const budgetTracker = new BudgetTracker()
      const { analysis, usedFallback } = await runRegulationAnalyst({
        text: await loadExtractedText(regulationId),
        regulationType,
        jurisdiction,
        budgetTracker,
      })
      return { analysis, usedFallback, tokenUsage: budgetTracker.getUsage().total }
    })

    await step.run("persist-analysis", async () => {
      await markRegulationProcessed(regulationId, {
        analysisResult: analysis.analysis,
        tokenUsage: analysis.tokenUsage,
      })
    })

    return {
      regulationId,
      status: "processed" as const,
      usedFallback: analysis.usedFallback,
    }
  }
)
