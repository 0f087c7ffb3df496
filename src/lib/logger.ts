import * as Sentry from "@sentry/node"

/**
 * Structured logger using Sentry.logger
 *
 * Logs are only shipped when `initInstrumentation` ran with a DSN;
 * otherwise calls are no-ops and console output carries diagnostics.
 *
 * @example
 * ```ts
 * import { logger } from "@/lib/logger"
 *
 * logger.info("Rule index ready", { collection, count })
 * logger.warn("Checklist source skipped", { url })
 * ```
 */
export const logger = Sentry.logger
