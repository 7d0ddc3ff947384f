import { ZodError, z } from 'zod'

export const DEFAULT_TIMEOUT_SECONDS = 20
export const DEFAULT_MAX_ATTEMPTS = 1
export const DEFAULT_RETRY_DELAY_BASE_SECONDS = 2
export const DEFAULT_RETRY_DELAY_MAX_SECONDS = 30

// Entries in a policies file may be partial; missing fields take the documented defaults.
export const ExecutionPolicySchema = z.object({
  // <= 0 disables the per-attempt timeout
  timeoutSeconds: z.number().finite().default(DEFAULT_TIMEOUT_SECONDS),
  // Total attempts including the first one
  maxAttempts: z.number().int().min(1).default(DEFAULT_MAX_ATTEMPTS),
  retryDelayBaseSeconds: z.number().finite().min(0).default(DEFAULT_RETRY_DELAY_BASE_SECONDS),
  retryDelayMaxSeconds: z.number().finite().min(0).default(DEFAULT_RETRY_DELAY_MAX_SECONDS),
  exponentialBackoff: z.boolean().default(true),
  retryOnFailureResult: z.boolean().default(false),
  retryOnException: z.boolean().default(true)
})
export type ExecutionPolicy = Readonly<z.infer<typeof ExecutionPolicySchema>>
export type ExecutionPolicyInput = z.input<typeof ExecutionPolicySchema>

export const CommandPoliciesSchema = z.object({
  default: ExecutionPolicySchema.default({}),
  commands: z.record(ExecutionPolicySchema).default({}),
  // canonical operation key -> alternative spellings that share its policy
  aliases: z.record(z.array(z.string().min(1))).default({})
})
export type CommandPolicies = z.infer<typeof CommandPoliciesSchema>
export type CommandPoliciesInput = z.input<typeof CommandPoliciesSchema>

export class CommandPoliciesError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message)
    this.name = 'CommandPoliciesError'
  }
}

export function freezePolicy(policy: z.infer<typeof ExecutionPolicySchema>): ExecutionPolicy {
  return Object.freeze({ ...policy })
}

export const DEFAULT_EXECUTION_POLICY: ExecutionPolicy = freezePolicy(ExecutionPolicySchema.parse({}))

export function parseExecutionPolicy(input: unknown): ExecutionPolicy {
  return freezePolicy(ExecutionPolicySchema.parse(input ?? {}))
}

export function parseCommandPolicies(input: unknown): CommandPolicies {
  try {
    const parsed = CommandPoliciesSchema.parse(input ?? {})
    const commands: Record<string, ExecutionPolicy> = {}
    for (const [key, policy] of Object.entries(parsed.commands)) {
      const trimmed = key.trim()
      if (!trimmed) {
        throw new CommandPoliciesError('Command policy keys must not be blank')
      }
      commands[trimmed] = freezePolicy(policy)
    }
    return {
      default: freezePolicy(parsed.default),
      commands,
      aliases: parsed.aliases
    }
  } catch (error) {
    if (error instanceof ZodError) {
      throw new CommandPoliciesError(`Invalid command policies: ${error.message}`, error.issues)
    }
    throw error
  }
}
