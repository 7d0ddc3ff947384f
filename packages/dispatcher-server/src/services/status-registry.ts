import { isTerminalStatus, type CommandSnapshot } from '@taskdeck/shared'

export type SnapshotPatch = Partial<Omit<CommandSnapshot, 'runId' | 'operationName' | 'enqueuedAt'>>

type Entry = {
  snapshot: CommandSnapshot
  // registration order, kept across replacements
  sequence: number
}

/**
 * Live snapshots for in-flight and recently finished commands.
 *
 * Stored snapshots are frozen; every change swaps in a new object so readers
 * holding an earlier snapshot never observe a half-applied update.
 */
export class CommandStatusRegistry {
  private readonly entries = new Map<string, Entry>()
  private nextSequence = 1

  get size() {
    return this.entries.size
  }

  has(runId: string): boolean {
    return this.entries.has(runId)
  }

  get(runId: string): CommandSnapshot | undefined {
    return this.entries.get(runId)?.snapshot
  }

  register(snapshot: CommandSnapshot): CommandSnapshot {
    if (this.entries.has(snapshot.runId)) {
      throw new Error(`Command ${snapshot.runId} is already registered`)
    }
    return this.upsert(snapshot)
  }

  upsert(snapshot: CommandSnapshot): CommandSnapshot {
    const frozen = freezeSnapshot(snapshot)
    const existing = this.entries.get(snapshot.runId)
    if (existing) {
      existing.snapshot = frozen
    } else {
      this.entries.set(snapshot.runId, { snapshot: frozen, sequence: this.nextSequence++ })
    }
    return frozen
  }

  update(runId: string, patch: SnapshotPatch): CommandSnapshot | undefined {
    const existing = this.entries.get(runId)
    if (!existing) return undefined
    existing.snapshot = freezeSnapshot({ ...existing.snapshot, ...patch })
    return existing.snapshot
  }

  activeCommands(now: Date = new Date(), retentionMs = Number.POSITIVE_INFINITY): CommandSnapshot[] {
    const visible: Entry[] = []
    for (const entry of this.entries.values()) {
      if (!isExpired(entry.snapshot, now, retentionMs)) {
        visible.push(entry)
      }
    }
    return visible
      .sort((a, b) => b.snapshot.priority - a.snapshot.priority || a.sequence - b.sequence)
      .map((entry) => entry.snapshot)
  }

  prune(options: { retentionMs: number; now?: Date }): string[] {
    const now = options.now ?? new Date()
    const removed: string[] = []
    for (const [runId, entry] of this.entries) {
      if (isExpired(entry.snapshot, now, options.retentionMs)) {
        this.entries.delete(runId)
        removed.push(runId)
      }
    }
    return removed
  }
}

function isExpired(snapshot: CommandSnapshot, now: Date, retentionMs: number): boolean {
  if (!isTerminalStatus(snapshot.status) || !snapshot.finishedAt) return false
  return now.getTime() - Date.parse(snapshot.finishedAt) > retentionMs
}

function freezeSnapshot(snapshot: CommandSnapshot): CommandSnapshot {
  return Object.freeze({ ...snapshot, metadata: Object.freeze({ ...snapshot.metadata }) })
}
