/**
 * @fileoverview Regulation upload and listing
 *
 * Uploads are stored and handed to the `process-regulation` background
 * function; clients poll `GET /regulations/:regulationId` for the outcome.
 *
 * @module app/routes/regulations
 */

import { Router } from "express"
import { z } from "zod"
import {
  createRegulation,
  getRegulationById,
  listRegulations,
  markRegulationFailed,
  updateRegulationFilePath,
} from "@/db/queries/regulations"
import { inngest } from "@/inngest/client"
import { listPayload, reply } from "@/lib/api-utils"
import { createHandler } from "@/lib/api/handler"
import { pipe, withFile, withInput, withParams, withRequest } from "@/lib/api/middleware"
import { isSupportedMimeType } from "@/lib/document-extraction"
import { BadRequestError, NotFoundError, ServiceUnavailableError } from "@/lib/errors"
import { fmt, logger } from "@/lib/logger"
import { deleteFile, sanitizeFileName, saveUpload } from "@/lib/storage"
import { serializeRegulation } from "../serializers"

/** Optional text field; blank form values count as absent */
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined))

export const uploadFields = z.object({
  regulation_type: optionalText.transform((value) => value ?? "general"),
  jurisdiction: optionalText.transform((value) => value ?? "global"),
  effective_date: optionalText,
})

export const regulationParams = z.object({
  regulationId: z.string(),
})

export const UPLOAD_NOT_STORED_MESSAGE = "Upload could not be stored"

/**
 * Write the upload and record its path on the regulation. On failure the
 * regulation is marked failed and a written file removed before the error
 * propagates.
 */
async function storeUpload(
  regulationId: string,
  fileName: string,
  content: Buffer
): Promise<string> {
  let filePath: string | null = null
  try {
    filePath = (await saveUpload(regulationId, fileName, content)).path
    await updateRegulationFilePath(regulationId, filePath)
    return filePath
  } catch (err) {
    logger.error(fmt`Could not store upload for ${regulationId}`, {
      error: err instanceof Error ? err.message : String(err),
    })
    await markRegulationFailed(regulationId, UPLOAD_NOT_STORED_MESSAGE)
    if (filePath) await deleteFile(filePath)
    throw err
  }
}

export const regulationsRouter = Router()

/**
 * POST /upload_regulation
 * Multipart `file` plus regulation_type, jurisdiction and effective_date.
 */
regulationsRouter.post(
  "/upload_regulation",
  createHandler(pipe(withFile("file"), withInput(uploadFields)), async ({ file, input }) => {
    if (!isSupportedMimeType(file.mimetype)) {
      throw new BadRequestError("Unsupported file type")
    }

    const fileName = sanitizeFileName(file.originalname)
    const regulation = await createRegulation({
      fileName,
      mimeType: file.mimetype,
      regulationType: input.regulation_type,
      jurisdiction: input.jurisdiction,
      effectiveDate: input.effective_date ?? null,
      status: "processing",
    })

    const filePath = await storeUpload(regulation.id, fileName, file.buffer)

    try {
      await inngest.send({
        name: "regulation/uploaded",
        data: {
          regulationId: regulation.id,
          filePath,
          mimeType: file.mimetype,
          regulationType: regulation.regulationType,
          jurisdiction: regulation.jurisdiction,
        },
      })
    } catch (err) {
      logger.error(fmt`Could not dispatch processing for ${regulation.id}`, {
        error: err instanceof Error ? err.message : String(err),
      })
      await markRegulationFailed(regulation.id, "Background processing unavailable")
      await deleteFile(filePath)
      throw new ServiceUnavailableError("Background processing is unavailable")
    }

    return reply(
      { regulation_id: regulation.id, status: "processing" as const },
      "File received. Processing in background."
    )
  })
)

/**
 * GET /regulations
 */
regulationsRouter.get(
  "/regulations",
  createHandler(withRequest, async () => {
    const regulations = await listRegulations()
    return listPayload(regulations.map(serializeRegulation))
  })
)

/**
 * GET /regulations/:regulationId
 */
regulationsRouter.get(
  "/regulations/:regulationId",
  createHandler(withParams(regulationParams), async ({ params }) => {
    const regulation = await getRegulationById(params.regulationId)
    if (!regulation) throw new NotFoundError("Regulation not found")
    return serializeRegulation(regulation)
  })
)
