/**
 * Composable API middleware with type inference.
 *
 * Each middleware reads the request and contributes typed fields to the
 * handler context (`body`, `query`, `params`, `input`, `file`). Failures are
 * thrown as AppErrors and rendered by `createHandler`.
 */

import type { Request, Response } from "express"
import multer from "multer"
import { z } from "zod"
import { getConfig } from "@/lib/config"
import { BadRequestError, PayloadTooLargeError, ValidationError } from "@/lib/errors"

/**
 * Base context with the express request and response.
 */
export type BaseContext = {
  req: Request
  res: Response
}

/**
 * Middleware function signature.
 * Resolves with the fields it adds to the context, or throws an AppError.
 */
export type Middleware<Out extends object> = (ctx: BaseContext) => Promise<Out>

/**
 * Pipe multiple middlewares left-to-right.
 */
export function pipe<A extends object>(m1: Middleware<A>): Middleware<A>
export function pipe<A extends object, B extends object>(
  m1: Middleware<A>,
  m2: Middleware<B>
): Middleware<A & B>
export function pipe<A extends object, B extends object, C extends object>(
  m1: Middleware<A>,
  m2: Middleware<B>,
  m3: Middleware<C>
): Middleware<A & B & C>
export function pipe(...middlewares: Middleware<object>[]): Middleware<object> {
  return async (ctx) => {
    let fields: object = {}
    for (const mw of middlewares) {
      fields = { ...fields, ...(await mw(ctx)) }
    }
    return fields
  }
}

/**
 * No-op middleware for handlers that only need the request.
 */
export const withRequest: Middleware<Record<never, never>> = async () => ({})

function parseOrThrow<T>(schema: z.ZodType<T>, value: unknown, message: string): T {
  const result = schema.safeParse(value)

  if (!result.success) {
    throw ValidationError.fromZodError(result.error, message)
  }

  return result.data
}

function bodyObject(req: Request): Record<string, unknown> {
  const body: unknown = req.body
  return typeof body === "object" && body !== null && !Array.isArray(body)
    ? Object.fromEntries(Object.entries(body))
    : {}
}

/**
 * Validate the JSON request body with a Zod schema.
 */
export function withBody<T>(schema: z.ZodType<T>): Middleware<{ body: T }> {
  return async ({ req }) => ({
    body: parseOrThrow(schema, bodyObject(req), "Invalid request body"),
  })
}

/**
 * Validate query parameters with a Zod schema.
 */
export function withQuery<T>(schema: z.ZodType<T>): Middleware<{ query: T }> {
  return async ({ req }) => ({
    query: parseOrThrow(schema, { ...req.query }, "Invalid query parameters"),
  })
}

/**
 * Validate route parameters with a Zod schema.
 */
export function withParams<T>(schema: z.ZodType<T>): Middleware<{ params: T }> {
  return async ({ req }) => ({
    params: parseOrThrow(schema, { ...req.params }, "Invalid path parameters"),
  })
}

/**
 * Validate fields that may arrive either as query parameters or in the body
 * (JSON or multipart form fields). Body fields win.
 */
export function withInput<T>(schema: z.ZodType<T>): Middleware<{ input: T }> {
  return async ({ req }) => ({
    input: parseOrThrow(schema, { ...req.query, ...bodyObject(req) }, "Invalid request"),
  })
}

/**
 * Accept a single multipart file held in memory.
 * Multipart text fields become available on `req.body` for later middleware.
 */
export function withFile(field: string): Middleware<{ file: Express.Multer.File }> {
  return async ({ req, res }) => {
    const upload = multer({
      storage: multer.memoryStorage(),
      limits: { fileSize: getConfig().maxUploadBytes, files: 1 },
    }).single(field)

    await new Promise<void>((resolve, reject) => {
      upload(req, res, (err: unknown) => {
        if (err instanceof multer.MulterError) {
          reject(
            err.code === "LIMIT_FILE_SIZE"
              ? new PayloadTooLargeError("File too large")
              : new BadRequestError(err.message)
          )
        } else if (err) {
          reject(err)
        } else {
          resolve()
        }
      })
    })

    if (!req.file) {
      throw new ValidationError("No file provided", [{ field, message: "Required" }])
    }

    return { file: req.file }
  }
}
