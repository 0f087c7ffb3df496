/**
 * @fileoverview Shared CLI bootstrap
 *
 * Loads `.env.local` then `.env` (values already in the environment win,
 * then `.env.local` over `.env`), validates configuration, starts
 * instrumentation and opens the rule store. Errors leave the process with
 * a JSON error body on stderr and exit code 1.
 *
 * @module cli/runtime
 */

import { config as loadEnv } from 'dotenv'
import { openRuleDatabase } from '@/db/client'
import { flushInstrumentation, initInstrumentation } from '@/instrument'
import { loadConfig, type AppConfig } from '@/lib/config'
import { VoyageAIClient } from '@/lib/embeddings'
import { toAppError } from '@/lib/errors'
import { RuleVectorStore } from '@/rules'

export interface CliContext {
  config: AppConfig
  store: RuleVectorStore
}

export function loadCliConfig(): AppConfig {
  loadEnv({ path: ['.env.local', '.env'] })
  const config = loadConfig(process.env)
  initInstrumentation(config)
  return config
}

/**
 * Run `fn` with an open rule store and turn its outcome into an exit code.
 */
export async function runCli(fn: (context: CliContext) => Promise<number>): Promise<number> {
  try {
    const config = loadCliConfig()
    const { db, close } = await openRuleDatabase(config.rulesDbDir)
    try {
      const store = new RuleVectorStore({
        db,
        embeddings: new VoyageAIClient({ apiKey: config.voyageApiKey }),
        collection: config.rulesCollection,
      })
      return await fn({ config, store })
    } finally {
      await close()
    }
  } catch (error) {
    const appError = toAppError(error)
    console.error(JSON.stringify(appError.toJSON(), null, 2))
    return 1
  } finally {
    await flushInstrumentation()
  }
}
