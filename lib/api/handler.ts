/**
 * Route handler factory with middleware composition.
 */

import path from "node:path"
import type { RequestHandler, Response } from "express"
import { type Middleware, type BaseContext } from "./middleware"
import { success, error, Reply, FileReply } from "@/lib/api-utils"
import { toAppError } from "@/lib/errors"
import { logger } from "@/lib/logger"

/**
 * Create an express route handler with a middleware chain.
 *
 * The handler's return value is wrapped in the success envelope. Return a
 * `Reply` to set the message or status, or a `FileReply` to send a file.
 *
 * @example
 * ```typescript
 * router.get(
 *   "/regulations/:regulationId",
 *   createHandler(withParams(regulationParams), async ({ params }) => {
 *     return getRegulationOrThrow(params.regulationId)
 *   })
 * )
 * ```
 */
export function createHandler<Ctx extends object, T>(
  middleware: Middleware<Ctx>,
  handler: (ctx: BaseContext & Ctx) => Promise<T>
): RequestHandler {
  return async (req, res) => {
    const base: BaseContext = { req, res }

    try {
      const fields = await middleware(base)
      const result = await handler({ ...base, ...fields })

      if (result instanceof FileReply) {
        await sendFile(res, result)
      } else if (result instanceof Reply) {
        success(res, result.data, result.message, result.status)
      } else {
        success(res, result)
      }
    } catch (err) {
      const appError = toAppError(err)

      // Log server errors
      if (appError.statusCode >= 500) {
        console.error("[API Error]", {
          code: appError.code,
          message: appError.message,
          stack: err instanceof Error ? err.stack : undefined,
          url: req.originalUrl,
          method: req.method,
        })
        logger.error("API request failed", {
          code: appError.code,
          url: req.originalUrl,
          method: req.method,
        })
      }

      if (res.headersSent) {
        res.end()
        return
      }

      error(res, appError)
    }
  }
}

async function sendFile(res: Response, file: FileReply): Promise<void> {
  if (file.disposition === "attachment") {
    res.attachment(file.fileName)
  } else {
    res.setHeader("Content-Disposition", `inline; filename="${file.fileName}"`)
  }
  res.type(file.contentType)

  if (file.body instanceof Uint8Array) {
    res.send(Buffer.from(file.body))
    return
  }

  const absolutePath = path.resolve(file.body.path)
  await new Promise<void>((resolve, reject) => {
    res.sendFile(absolutePath, (err) => (err ? reject(err) : resolve()))
  })
}
