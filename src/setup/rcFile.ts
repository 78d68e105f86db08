/**
 * Shell rc-file setup: exports PLAN_FILE and adds a `plan` alias
 */

import { promises as fs } from 'fs'
import path from 'path'

export const PLAN_FILE_ENV = 'PLAN_FILE'
export const ALIAS_NAME = 'plan'

// Preference order when picking the rc file to update
const RC_CANDIDATES = ['.zshrc', '.bashrc'] as const
const FALLBACK_RC = '.profile'

export interface RcUpdateResult {
  lines: string[]
  addedExport: boolean
  addedAlias: boolean
}

/**
 * Pick ~/.zshrc, then ~/.bashrc, else ~/.profile
 */
export function selectRcFile(home: string, exists: (filePath: string) => boolean): string {
  for (const candidate of RC_CANDIDATES) {
    const candidatePath = path.join(home, candidate)
    if (exists(candidatePath)) {
      return candidatePath
    }
  }
  return path.join(home, FALLBACK_RC)
}

export function exportLine(planFile: string): string {
  return `export ${PLAN_FILE_ENV}="${planFile}"`
}

export function aliasLine(aliasCommand: string): string {
  return `alias ${ALIAS_NAME}='${aliasCommand}'`
}

/**
 * Append the export and alias lines unless a line defining them already exists.
 * Existing definitions are left untouched, even when they point elsewhere.
 */
export function applyRcUpdates(lines: readonly string[], planFile: string, aliasCommand: string): RcUpdateResult {
  const updated = [...lines]
  const hasExport = lines.some((line) => line.startsWith(`export ${PLAN_FILE_ENV}=`))
  const hasAlias = lines.some((line) => line.startsWith(`alias ${ALIAS_NAME}=`))

  if (!hasExport) updated.push(exportLine(planFile))
  if (!hasAlias) updated.push(aliasLine(aliasCommand))

  return { lines: updated, addedExport: !hasExport, addedAlias: !hasAlias }
}

function splitLines(content: string): string[] {
  if (content === '') return []
  const lines = content.split('\n')
  if (lines[lines.length - 1] === '') lines.pop()
  return lines
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Read the rc file (a missing file counts as empty), apply updates, write only on change
 */
export async function updateRcFile(rcPath: string, planFile: string, aliasCommand: string): Promise<RcUpdateResult> {
  let content = ''
  try {
    content = await fs.readFile(rcPath, 'utf-8')
  } catch (error) {
    if (!isMissingFileError(error)) throw error
  }

  const result = applyRcUpdates(splitLines(content), planFile, aliasCommand)

  if (result.addedExport) console.log(`[Setup] Added ${PLAN_FILE_ENV} export to ${rcPath}`)
  else console.log(`[Setup] ${PLAN_FILE_ENV} export already exists in ${rcPath}`)
  if (result.addedAlias) console.log(`[Setup] Added alias '${ALIAS_NAME}' to ${rcPath}`)
  else console.log(`[Setup] Alias '${ALIAS_NAME}' already exists in ${rcPath}`)

  if (result.addedExport || result.addedAlias) {
    await fs.writeFile(rcPath, `${result.lines.join('\n')}\n`, 'utf-8')
  } else {
    console.log(`[Setup] No changes made to ${rcPath}`)
  }
  return result
}
