import { CommandCancelledError } from './command-errors'

export type ScopePermit = {
  readonly scope: string | null
  readonly id: number
}

type Waiter = {
  permit: ScopePermit
  resolve: (permit: ScopePermit) => void
}

type ScopeEntry = {
  holder: ScopePermit
  waiters: Waiter[]
}

/**
 * Per-key mutual exclusion with strict FIFO hand-off.
 *
 * A null scope never blocks. For a named scope the next waiter receives the permit
 * directly on release, so nothing can slip in between two queued holders.
 */
export class ScopeLock {
  private readonly entries = new Map<string, ScopeEntry>()
  private nextId = 1

  get size() {
    return this.entries.size
  }

  isHeld(scope: string | null): boolean {
    return scope !== null && this.entries.has(scope)
  }

  pendingCount(scope: string): number {
    return this.entries.get(scope)?.waiters.length ?? 0
  }

  tryAcquire(scope: string | null): ScopePermit | null {
    const permit = this.createPermit(scope)
    if (scope === null) return permit
    if (this.entries.has(scope)) return null
    this.entries.set(scope, { holder: permit, waiters: [] })
    return permit
  }

  async acquire(scope: string | null, signal?: AbortSignal): Promise<ScopePermit> {
    if (signal?.aborted) {
      throw new CommandCancelledError()
    }

    const immediate = this.tryAcquire(scope)
    if (immediate) return immediate

    // tryAcquire only fails for a held, named scope
    const entry = scope === null ? undefined : this.entries.get(scope)
    if (!entry) {
      throw new Error(`Scope lock state lost for ${String(scope)}`)
    }

    const permit = this.createPermit(scope)
    return new Promise<ScopePermit>((resolve, reject) => {
      const onAbort = () => {
        const index = entry.waiters.indexOf(waiter)
        if (index !== -1) {
          entry.waiters.splice(index, 1)
        }
        reject(new CommandCancelledError())
      }
      const waiter: Waiter = {
        permit,
        resolve: (granted) => {
          signal?.removeEventListener('abort', onAbort)
          resolve(granted)
        }
      }
      entry.waiters.push(waiter)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }

  release(permit: ScopePermit): void {
    if (permit.scope === null) return
    const entry = this.entries.get(permit.scope)
    // stale or double release
    if (!entry || entry.holder.id !== permit.id) return

    const next = entry.waiters.shift()
    if (!next) {
      this.entries.delete(permit.scope)
      return
    }
    entry.holder = next.permit
    next.resolve(next.permit)
  }

  private createPermit(scope: string | null): ScopePermit {
    const permit: ScopePermit = Object.freeze({ scope, id: this.nextId })
    this.nextId += 1
    return permit
  }
}
