#!/usr/bin/env node
/**
 * CLI — crawl storefronts and write letter-bucketed catalogs.
 *
 * Usage:
 *   npm run crawl -- --stores nintendo,steam --out ./out --country US --locale en-US
 *   npm run stores
 */

import { listStores, loadStoreProfiles } from './adapters/registry.js'
import { crawl, type RunResult } from './core/runner.js'
import { config } from './lib/config.js'
import { ConfigError, errorMessage } from './lib/errors.js'

const args = process.argv.slice(2)
const command = args[0]

function getFlag(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`)
  return idx >= 0 ? args[idx + 1] : undefined
}

function printUsage() {
  console.log(`
Usage:
  tsx src/cli.ts crawl [--stores <a,b>] [--out <dir>] [--country <CC>] [--locale <ll-CC>]
  tsx src/cli.ts list

Examples:
  tsx src/cli.ts crawl --stores nintendo
  tsx src/cli.ts crawl --stores steam,psn,xbox,nintendo --out ./out
`)
}

function printResult(r: RunResult) {
  console.log(`\n--- ${r.store} ---`)
  if (r.error) {
    console.log(`  ${r.aborted ? 'ABORTED' : 'FAILED'}: ${r.error}`)
    return
  }
  console.log(`  Items: ${r.itemCount}`)
  console.log(`  Clusters: ${r.summary?.clusterCount ?? 0}`)
  console.log(`  Output: ${r.outputDir}`)
  console.log(`  Duration: ${(r.durationMs / 1000).toFixed(1)}s`)
}

async function main() {
  if (command === 'list') {
    loadStoreProfiles()
    const stores = listStores()
    console.log('Available stores:')
    stores.forEach(s => console.log(`  - ${s}`))
    if (stores.length === 0) console.log('  (none — add stores/<slug>/store.json)')
    process.exit(0)
  }

  if (command !== 'crawl') {
    printUsage()
    process.exit(1)
  }

  const stores = (getFlag('stores') ?? 'steam')
    .split(',')
    .map(s => s.trim().toLowerCase())
    .filter(Boolean)
  const outDir = getFlag('out') ?? config.catalog.outDir
  const adapterConfig = {
    country: getFlag('country') ?? config.catalog.country,
    locale: getFlag('locale') ?? config.catalog.locale,
  }

  const controller = new AbortController()
  process.once('SIGINT', () => {
    console.log('\nInterrupted, discarding in-flight crawls...')
    controller.abort(new Error('interrupted'))
  })

  console.log(`\n=== Crawling: ${stores.join(', ')} (${adapterConfig.country}/${adapterConfig.locale}) ===`)

  let results: RunResult[]
  try {
    results = await crawl({ stores, outDir, config: adapterConfig, signal: controller.signal })
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err
    console.error(`Error: ${err.message}`)
    process.exit(1)
  }

  results.forEach(printResult)

  const failed = results.filter(r => r.error)
  console.log('\n=== SUMMARY ===')
  console.log(`  Succeeded: ${results.length - failed.length}`)
  console.log(`  Failed: ${failed.length}`)
  console.log(`  Total items: ${results.reduce((s, r) => s + r.itemCount, 0)}`)
  process.exit(failed.length > 0 ? 1 : 0)
}

main().catch(err => {
  console.error('Fatal error:', errorMessage(err))
  process.exit(1)
})
