import type { Response } from "express"
import { type AppError, type SerializedError } from "./errors"

/**
 * Standard API response shape for all endpoints.
 */
export type ApiResponse<T = unknown> =
  | { success: true; message: string; data: T }
  | { success: false; error: SerializedError }

/**
 * Paginated-style list payload returned by the collection endpoints.
 */
export interface ListPayload<T> {
  items: T[]
  count: number
}

export function listPayload<T>(items: T[]): ListPayload<T> {
  return { items, count: items.length }
}

/**
 * Send a success response.
 */
export function success<T>(res: Response, data: T, message = "OK", status = 200): void {
  const body: ApiResponse<T> = { success: true, message, data }
  res.status(status).json(body)
}

/**
 * Send an error response from an AppError.
 */
export function error(res: Response, err: AppError): void {
  const body: ApiResponse<never> = { success: false, error: err.toJSON() }
  res.status(err.statusCode).json(body)
}

/**
 * A handler result carrying a message alongside the data, for endpoints
 * whose clients display the server's wording ("Report generated", ...).
 */
export class Reply<T> {
  constructor(
    public readonly data: T,
    public readonly message: string,
    public readonly status = 200
  ) {}
}

export function reply<T>(data: T, message: string, status = 200): Reply<T> {
  return new Reply(data, message, status)
}

/**
 * A handler result that streams a file instead of the JSON envelope.
 */
export class FileReply {
  constructor(
    public readonly body: Buffer | Uint8Array | { path: string },
    public readonly contentType: string,
    public readonly fileName: string,
    public readonly disposition: "attachment" | "inline" = "attachment"
  ) {}
}
