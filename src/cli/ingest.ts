#!/usr/bin/env -S npx tsx
/**
 * Rule index CLI
 *
 * Builds the rule index from the rulebook page when the collection is
 * empty; does nothing when it is already populated.
 *
 * Usage: npm run ingest -- [--source <url>]
 */

import { parseArgs } from 'node:util'
import { ensureRuleIndex } from '@/rules'
import { runCli } from './runtime'

const { values } = parseArgs({
  options: {
    source: { type: 'string' },
  },
})

process.exitCode = await runCli(async ({ config, store }) => {
  const status = await ensureRuleIndex({ store, sourceUrl: values.source ?? config.rulesSourceUrl })
  console.log(JSON.stringify({ collection: store.collection, ...status }, null, 2))
  return 0
})
