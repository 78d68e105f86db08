import { config as loadEnv } from 'dotenv'
import { render } from 'ink'
import type { ParseResult } from '@/types'
import { loadAppConfig, USAGE } from '@/lib/config'
import { createClock } from '@/lib/clock'
import { PlanFileUnavailableError, isAppError } from '@/lib/errors'
import { loadPlanFile } from '@/lib/planLoader'
import { Dashboard } from '@/components/Dashboard'

loadEnv()

async function main(): Promise<void> {
  const appConfig = loadAppConfig(process.argv.slice(2), process.env)
  if (appConfig.help) {
    console.log(USAGE)
    return
  }

  let result: ParseResult
  try {
    result = await loadPlanFile(appConfig.planFile)
  } catch (error) {
    if (error instanceof PlanFileUnavailableError) {
      console.error(`Error: Plan file '${error.filePath}' not found.`)
      process.exitCode = 1
      return
    }
    throw error
  }

  const clock = createClock({ simulate: appConfig.simulate })
  const { waitUntilExit } = render(
    <Dashboard result={result} clock={clock} excludeBreaks={appConfig.excludeBreaks} />
  )
  await waitUntilExit()
}

main().catch((error: unknown) => {
  if (isAppError(error)) {
    console.error(`[CLI] ${error.name} (${error.code}): ${error.message}`)
  } else {
    console.error('[CLI] Unexpected error:', error)
  }
  process.exit(1)
})
