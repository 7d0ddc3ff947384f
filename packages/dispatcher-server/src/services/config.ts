import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { config as loadEnv } from 'dotenv'
import { z } from 'zod'
import { CommandPoliciesError } from '@taskdeck/shared'
import { getLogger } from './logger'
import { PolicyStore, createDefaultPolicyStore } from './policy-store'

// Unset and blank variables both fall back to the default.
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const DispatcherEnvSchema = z.object({
  DISPATCHER_MAX_PARALLEL: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(3)),
  DISPATCHER_RETENTION_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(300_000)),
  DISPATCHER_PRUNE_INTERVAL_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(30_000)),
  COMMAND_POLICIES_PATH: z.preprocess(blankToUndefined, z.string().optional()),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info')
  ),
  NODE_ENV: z.preprocess(blankToUndefined, z.string().default('development')),
  API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  CORS_ALLOW_ORIGINS: z.preprocess(blankToUndefined, z.string().optional()),
  SSE_HEARTBEAT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(15_000))
})

export type DispatcherConfig = {
  maxParallel: number
  retentionMs: number
  pruneIntervalMs: number
  policiesPath: string | null
  logLevel: string
  nodeEnv: string
  apiKey: string | null
  corsAllowOrigins: string[]
  sseHeartbeatMs: number
}

export class DispatcherConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message)
    this.name = 'DispatcherConfigError'
  }
}

/** Loads `.env` then `.env.local` from each directory; later directories win. */
export function loadEnvFiles(dirs: string[] = [resolve(process.cwd(), '..', '..'), process.cwd()]) {
  for (const dir of dirs) {
    loadEnv({ path: resolve(dir, '.env'), override: false })
    loadEnv({ path: resolve(dir, '.env.local'), override: true })
  }
}

export function parseDispatcherConfig(env: NodeJS.ProcessEnv = process.env): DispatcherConfig {
  const parsed = DispatcherEnvSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new DispatcherConfigError(`Invalid dispatcher configuration: ${details}`, parsed.error.issues)
  }
  const values = parsed.data
  return {
    maxParallel: values.DISPATCHER_MAX_PARALLEL,
    retentionMs: values.DISPATCHER_RETENTION_MS,
    pruneIntervalMs: values.DISPATCHER_PRUNE_INTERVAL_MS,
    policiesPath: values.COMMAND_POLICIES_PATH ?? null,
    logLevel: values.LOG_LEVEL,
    nodeEnv: values.NODE_ENV,
    apiKey: values.API_KEY ?? null,
    corsAllowOrigins: (values.CORS_ALLOW_ORIGINS ?? '')
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    sseHeartbeatMs: values.SSE_HEARTBEAT_MS
  }
}

let cachedConfig: DispatcherConfig | null = null

export function getDispatcherConfig(): DispatcherConfig {
  if (!cachedConfig) {
    cachedConfig = parseDispatcherConfig(process.env)
  }
  return cachedConfig
}

export function __resetDispatcherConfigForTest() {
  cachedConfig = null
}

/**
 * Reads a policies table from a JSON file. No path, or a path that does not exist,
 * yields the default-only store; a malformed file throws.
 */
export function loadPolicyStore(path: string | null | undefined): PolicyStore {
  if (!path) return createDefaultPolicyStore()

  const fullPath = resolve(path)
  let raw: string
  try {
    raw = readFileSync(fullPath, 'utf8')
  } catch (error) {
    if (isMissingFile(error)) {
      getLogger().warn('command_policies_missing', { path: fullPath })
      return createDefaultPolicyStore()
    }
    throw error
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (error) {
    throw new CommandPoliciesError(
      `Invalid command policies file ${fullPath}: ${error instanceof Error ? error.message : String(error)}`
    )
  }

  const store = PolicyStore.fromInput(json)
  getLogger().info('command_policies_loaded', { path: fullPath, overrides: store.keys().length })
  return store
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
