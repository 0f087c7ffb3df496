import * as Sentry from "@sentry/node"
import type { AppConfig } from "@/lib/config"

/**
 * Initialise Sentry for a CLI run. Must be called before the pipeline
 * starts so AI SDK spans and console output are captured.
 */
export function initInstrumentation(config: Pick<AppConfig, "sentryDsn">): void {
  Sentry.init({
    dsn: config.sentryDsn,
    enabled: Boolean(config.sentryDsn),

    // Enable structured logging
    enableLogs: true,

    integrations: [
      // Console integration - captures console.log, console.warn, console.error
      Sentry.consoleLoggingIntegration({
        levels: ["log", "warn", "error"],
      }),
      // Vercel AI SDK integration - tracks LLM calls, tokens, latency
      Sentry.vercelAIIntegration({
        recordInputs: false,
        recordOutputs: true,
      }),
    ],

    tracesSampleRate: 1.0,
    debug: false,
  })
}

/** Flush buffered events before the process exits. */
export async function flushInstrumentation(timeoutMs = 2000): Promise<void> {
  await Sentry.flush(timeoutMs)
}
