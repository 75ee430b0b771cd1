/**
 * @fileoverview Inngest Event Type Definitions
 *
 * Events follow the naming convention `<domain>/<action>`. Payloads are
 * validated with zod before a function acts on them.
 *
 * @module inngest/types
 */

import { z } from "zod"

/**
 * Sent by the upload route once the file is stored and the regulation row
 * exists with status `processing`.
 */
export const regulationUploadedPayload = z.object({
  regulationId: z.string().uuid(),
  /** Stored upload, deleted once its text has been extracted */
  filePath: z.string().min(1),
  mimeType: z.string(),
  regulationType: z.string(),
  jurisdiction: z.string(),
})

export type RegulationUploadedPayload = z.infer<typeof regulationUploadedPayload>

/**
 * Event registry for `EventSchemas().fromRecord`.
 */
export type InngestEvents = {
  "regulation/uploaded": { data: RegulationUploadedPayload }
}
