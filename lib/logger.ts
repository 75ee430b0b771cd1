import * as Sentry from "@sentry/node";

/**
 * Structured logger using Sentry.logger
 *
 * Calls are no-ops until `instrument.ts` has initialised Sentry with a DSN.
 *
 * @example
 * ```ts
 * import { logger } from "@/lib/logger";
 *
 * logger.info("Regulation processed", { regulationId, framework });
 * logger.warn("Monitor source unreachable", { sourceId, status: 503 });
 * logger.error("Report generation failed", { regulationId, error: err.message });
 *
 * // Template literal formatting (creates searchable attributes)
 * logger.info(fmt`Source ${name} changed`);
 * ```
 */
export const logger = Sentry.logger;

// Re-export for template literal formatting
export const fmt = Sentry.logger.fmt;
