import { getOperationLookupKeys, type CommandMetadata, type ExecutionPolicy } from '@taskdeck/shared'
import type { PolicyStore } from './policy-store'

export type PolicyMatch = {
  policy: ExecutionPolicy
  // lookup key that matched, null when the default applied
  matchedKey: string | null
  source: 'operation' | 'metadata' | 'default'
}

export class PolicyResolver {
  constructor(private readonly store: PolicyStore) {}

  resolve(operationName: string | null | undefined, metadata?: Readonly<CommandMetadata> | null): ExecutionPolicy {
    return this.explain(operationName, metadata).policy
  }

  explain(operationName: string | null | undefined, metadata?: Readonly<CommandMetadata> | null): PolicyMatch {
    const byName = this.match(operationName)
    if (byName) {
      return { ...byName, source: 'operation' }
    }

    const operation = metadata?.operation
    const byMetadata = this.match(operation)
    if (byMetadata) {
      return { ...byMetadata, source: 'metadata' }
    }

    return { policy: this.store.getDefault(), matchedKey: null, source: 'default' }
  }

  private match(name: string | null | undefined): { policy: ExecutionPolicy; matchedKey: string } | null {
    if (!name || !name.trim()) return null
    for (const key of getOperationLookupKeys(name, this.store.aliases)) {
      const policy = this.store.lookup(key)
      if (policy) {
        return { policy, matchedKey: key }
      }
    }
    return null
  }
}
