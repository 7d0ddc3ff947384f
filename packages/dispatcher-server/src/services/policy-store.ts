import {
  DEFAULT_EXECUTION_POLICY,
  normalizeOperationName,
  parseCommandPolicies,
  type CommandPolicies,
  type ExecutionPolicy,
  type OperationAliases
} from '@taskdeck/shared'

/**
 * Default execution policy plus per-operation overrides.
 *
 * Overrides are registered under the lower-cased spelling they were configured with
 * and under the canonical snake_case key, so `TransformStoryRawToTagged` and
 * `transform_story_raw_to_tagged` land on the same entry. Read-only after construction.
 */
export class PolicyStore {
  private readonly defaultPolicy: ExecutionPolicy
  private readonly overrides = new Map<string, ExecutionPolicy>()
  readonly aliases: OperationAliases

  constructor(table: CommandPolicies = parseCommandPolicies({})) {
    this.defaultPolicy = Object.isFrozen(table.default) ? table.default : Object.freeze({ ...table.default })
    this.aliases = Object.freeze({ ...table.aliases })

    for (const [key, policy] of Object.entries(table.commands)) {
      const frozen = Object.isFrozen(policy) ? policy : Object.freeze({ ...policy })
      const verbatim = key.trim().toLowerCase()
      const canonical = normalizeOperationName(key)
      // an exact spelling always wins over a canonical collision from another entry
      this.overrides.set(verbatim, frozen)
      if (canonical && !this.overrides.has(canonical)) {
        this.overrides.set(canonical, frozen)
      }
    }
  }

  static fromInput(input: unknown): PolicyStore {
    return new PolicyStore(parseCommandPolicies(input))
  }

  getDefault(): ExecutionPolicy {
    return this.defaultPolicy
  }

  lookup(key: string): ExecutionPolicy | undefined {
    const lowered = key.trim().toLowerCase()
    if (!lowered) return undefined
    return this.overrides.get(lowered)
  }

  keys(): string[] {
    return Array.from(this.overrides.keys())
  }
}

export function createDefaultPolicyStore(): PolicyStore {
  return new PolicyStore({ default: DEFAULT_EXECUTION_POLICY, commands: {}, aliases: {} })
}
