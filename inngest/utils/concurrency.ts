/**
 * @fileoverview Concurrency Configuration for Inngest Functions
 *
 * @module inngest/utils/concurrency
 */

/**
 * Concurrency limits for Inngest functions.
 *
 * @example
 * inngest.createFunction(
 *   { id: "process-regulation", concurrency: CONCURRENCY.analysis },
 *   { event: "regulation/uploaded" },
 *   async ({ event, step }) => { ... }
 * )
 */
export const CONCURRENCY = {
  /** Regulation analysis; each run is one long model call */
  analysis: { limit: 3 },

  /** Source monitoring; one pass at a time */
  monitor: { limit: 1 },
} as const

/**
 * Retry configurations for different operation types.
 *
 * Inngest retries failed steps with exponential backoff.
 */
export const RETRY_CONFIG = {
  /** Model-backed analysis: a failed call is retried twice, then the regulation is marked failed */
  analysis: { retries: 2 },

  /** Monitor passes run again on the next schedule anyway */
  monitor: { retries: 0 },
} as const

export type ConcurrencyConfig = (typeof CONCURRENCY)[keyof typeof CONCURRENCY]

export type RetryConfig = (typeof RETRY_CONFIG)[keyof typeof RETRY_CONFIG]
