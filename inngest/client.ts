/**
 * @fileoverview Inngest Client Configuration
 *
 * Singleton Inngest client. All background functions are created with it
 * and the upload route sends its events through it.
 *
 * @module inngest/client
 * @see {@link https://www.inngest.com/docs/reference/client/create}
 */

import { Inngest, EventSchemas } from "inngest"
import type { InngestEvents } from "./types"

/**
 * @example
 * ```typescript
 * import { inngest } from "@/inngest/client"
 *
 * await inngest.send({
 *   name: "regulation/uploaded",
 *   data: { regulationId, filePath, mimeType, regulationType, jurisdiction },
 * })
 * ```
 */
export const inngest = new Inngest({
  id: "compliance-officer",
  schemas: new EventSchemas().fromRecord<InngestEvents>(),
})

export type InngestClient = typeof inngest
