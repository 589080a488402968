import fs from 'node:fs/promises'
import { PageFetcher, loadConfigFromEnv, scrapeOccupation } from '../src/index'

async function runExample() {
  console.log('\n--- O*NET Occupation Scraper ---')
  const code = process.argv[2]?.trim() || '15-1252.00'
  const shouldSaveToFile = !process.argv.includes('--print')

  const config = loadConfigFromEnv()
  const fetcher = new PageFetcher(config.fetcher)

  console.log(`\nScraping occupation: ${code}`)
  const result = await scrapeOccupation(fetcher, code, { baseUrl: config.baseUrl })
  if (!result.ok) {
    console.error(
      `Scraping failed after ${result.error.attempts} attempt(s) (${result.error.kind}): ${result.error.message}`,
    )
    process.exitCode = 1
    return
  }

  const { record, diagnostics } = result

  console.log(`\n${'='.repeat(50)}`)
  console.log('SCRAPE RESULTS:')
  console.log('='.repeat(50))

  if (shouldSaveToFile) {
    const filename = `occupation_${code.replace(/[^\d]/g, '_')}.json`
    await fs.writeFile(filename, JSON.stringify(record, null, 2))
    console.log(`\n✓ Occupation data saved to: ${filename}`)
    console.log(`\nQuick Summary:`)
    console.log(`Title:        ${record.title}`)
    console.log(`Family:       ${record.family}`)
    console.log(`Education:    ${record.educationLevel}`)
    console.log(`Salary:       ${record.salaryMedian ?? 'not reported'}`)
    console.log(`Technologies: ${record.technologySkills.slice(0, 8).join(', ')}`)
    console.log(`Completeness: ${(record.completenessScore * 100).toFixed(0)}%`)

    const fallbacks = diagnostics.filter((d) => (d.rank ?? 0) > 0)
    if (fallbacks.length > 0) {
      console.log('\nFields read through fallback probes:')
      for (const d of fallbacks) console.log(`- ${d.field}: ${d.probe}`)
    }
  } else {
    console.log(JSON.stringify(record, null, 2))
  }
  console.log(`${'='.repeat(50)}\n`)
}

runExample().catch(console.error)
