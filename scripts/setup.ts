import { existsSync } from 'fs'
import os from 'os'
import path from 'path'
import { createInterface } from 'readline/promises'
import { fileURLToPath } from 'url'
import { selectRcFile, updateRcFile } from '../src/setup/rcFile'

const PROJECT_ROOT = fileURLToPath(new URL('..', import.meta.url))
const CLI_ENTRY = path.join(PROJECT_ROOT, 'src', 'cli', 'index.tsx')
const TSX_BIN = path.join(PROJECT_ROOT, 'node_modules', '.bin', 'tsx')
const TSCONFIG = path.join(PROJECT_ROOT, 'tsconfig.json')

async function main() {
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  const answer = await rl.question('Enter the path of your plan file: ')
  rl.close()

  const planFile = answer.trim()
  if (!planFile) {
    console.error('Plan file path cannot be empty.')
    process.exit(1)
  }

  const absolutePlanFile = path.resolve(planFile)
  const rcPath = selectRcFile(os.homedir(), existsSync)
  console.log(`Updating settings in: ${rcPath}`)

  await updateRcFile(rcPath, absolutePlanFile, `${TSX_BIN} --tsconfig ${TSCONFIG} ${CLI_ENTRY}`)

  console.log('\nSetup complete!')
  console.log(`To start using the 'plan' command, run: source ${rcPath}`)
}

main().catch((error: unknown) => {
  console.error('[Setup] Failed:', error)
  process.exit(1)
})
