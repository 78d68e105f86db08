import { promises as fs } from 'fs'
import path from 'path'
import type { ParseResult } from '@/types'
import { PlanFileUnavailableError } from './errors'
import { parsePlan } from './planParser'

/**
 * Read a plan file and parse it. Any read failure is fatal for the caller.
 */
export async function loadPlanFile(filePath: string): Promise<ParseResult> {
  let content: string
  try {
    content = await fs.readFile(filePath, 'utf-8')
  } catch (error) {
    const cause = error instanceof Error ? error : undefined
    throw new PlanFileUnavailableError(
      filePath,
      `Failed to read plan file "${filePath}": ${cause?.message ?? String(error)}`,
      cause
    )
  }

  const days = parsePlan(content)
  console.log(`[PlanLoader] Loaded ${days.length} day(s) from ${path.basename(filePath)}`)
  return days
}
