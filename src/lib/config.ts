/**
 * CLI flags and environment → AppConfig
 * Precedence: flag > environment variable > default
 */

import { parseArgs } from 'util'
import { z } from 'zod'
import type { AppConfig } from '@/types'
import { ConfigLoadError, ValidationError } from './errors'

export const DEFAULT_PLAN_FILE = 'plan.txt'

// The dashboard hides breaks from "next" unless asked not to
export const DEFAULT_DASHBOARD_EXCLUDE_BREAKS = true

const BooleanEnvSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

const EnvSchema = z.object({
  PLAN_FILE: z.string().trim().min(1).optional(),
  PLAN_EXCLUDE_BREAKS: BooleanEnvSchema.optional(),
})

const FlagsSchema = z.object({
  plan: z.string().trim().min(1, 'Plan file path cannot be empty').optional(),
  simulate: z.string().trim().min(1, 'Simulated time cannot be empty').optional(),
  'include-breaks': z.boolean().optional(),
  'exclude-breaks': z.boolean().optional(),
  help: z.boolean().optional(),
})

type Flags = z.infer<typeof FlagsSchema>

export const USAGE = [
  'Usage: plan-scheduler [options]',
  '',
  'Live terminal view of the current and next event in a plan file (refreshes every minute).',
  '',
  'Options:',
  '  --plan <path>          Plan file (default: $PLAN_FILE or plan.txt)',
  '  --simulate <datetime>  Simulate the current time, e.g. "2025-04-07 09:30"',
  '  --include-breaks       Show "break" events as the next event',
  '  --exclude-breaks       Skip "break" events when picking the next event (default)',
  '  -h, --help             Show this help',
  '',
  'Keys: t = full schedule, q = back / quit',
].join('\n')

function parseFlags(argv: string[]): Flags {
  let values: unknown
  try {
    values = parseArgs({
      args: argv,
      options: {
        plan: { type: 'string' },
        simulate: { type: 'string' },
        'include-breaks': { type: 'boolean' },
        'exclude-breaks': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values
  } catch (error) {
    const cause = error instanceof Error ? error : undefined
    throw new ConfigLoadError(`Invalid command line: ${cause?.message ?? String(error)}`, cause)
  }

  const parsed = FlagsSchema.safeParse(values)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ValidationError(issue.message, issue.path.join('.'))
  }
  return parsed.data
}

function parseEnv(env: NodeJS.ProcessEnv): z.infer<typeof EnvSchema> {
  const parsed = EnvSchema.safeParse({
    PLAN_FILE: env.PLAN_FILE,
    PLAN_EXCLUDE_BREAKS: env.PLAN_EXCLUDE_BREAKS?.trim().toLowerCase(),
  })
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue.path.join('.')
    throw new ConfigLoadError(`Invalid environment variable ${field}: ${issue.message}`)
  }
  return parsed.data
}

export function loadAppConfig(argv: string[], env: NodeJS.ProcessEnv): AppConfig {
  const flags = parseFlags(argv)
  const envConfig = parseEnv(env)

  if (flags['include-breaks'] && flags['exclude-breaks']) {
    throw new ConfigLoadError('--include-breaks and --exclude-breaks cannot be used together')
  }

  let excludeBreaks = envConfig.PLAN_EXCLUDE_BREAKS ?? DEFAULT_DASHBOARD_EXCLUDE_BREAKS
  if (flags['include-breaks']) excludeBreaks = false
  if (flags['exclude-breaks']) excludeBreaks = true

  return {
    planFile: flags.plan ?? envConfig.PLAN_FILE ?? DEFAULT_PLAN_FILE,
    simulate: flags.simulate ?? null,
    excludeBreaks,
    help: flags.help ?? false,
  }
}
