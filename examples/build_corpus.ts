import fs from 'node:fs/promises'
import {
  CorpusBuilder,
  PageFetcher,
  analyzeCorpus,
  createConsoleCallback,
  discoverOccupations,
  loadConfigFromEnv,
} from '../src/index'

async function runExample() {
  console.log('\n--- O*NET Corpus Builder ---')
  const config = loadConfigFromEnv()
  const fetcher = new PageFetcher(config.fetcher)

  // Codes on the command line skip discovery; otherwise one family is indexed.
  const codes = process.argv.slice(2).filter((arg) => !arg.startsWith('--'))
  const targets =
    codes.length > 0
      ? codes
      : (await discoverOccupations(fetcher, { baseUrl: config.baseUrl, familyIds: [15] })).targets

  const controller = new AbortController()
  process.once('SIGINT', () => {
    console.log('\nStopping after in-flight requests...')
    controller.abort()
  })

  const builder = new CorpusBuilder({
    ...config.corpus,
    fetcher,
    baseUrl: config.baseUrl,
    callback: createConsoleCallback(process.argv.includes('--verbose')),
  })
  const result = await builder.build(targets, { signal: controller.signal })

  await fs.writeFile('corpus.json', JSON.stringify(result.records, null, 2))
  await fs.writeFile('failures.json', JSON.stringify(result.ledger, null, 2))
  console.log(`\n✓ ${result.records.length} record(s) saved to corpus.json`)
  console.log(`✓ ${result.ledger.length} failure(s) saved to failures.json`)

  const analysis = analyzeCorpus(result.records, { topN: 10 })
  console.log('\nTop technologies:')
  for (const { skill, count } of analysis.topTechnologies) {
    console.log(`  ${skill.padEnd(24)} ${count}`)
  }

  const drifting = result.health.fields.filter((f) => f.status !== 'healthy')
  if (drifting.length > 0) {
    console.log('\nExtraction health:')
    for (const f of drifting) console.log(`  ${f.message}`)
  }
}

runExample().catch(console.error)
