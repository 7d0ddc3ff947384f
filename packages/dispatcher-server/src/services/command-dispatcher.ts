import {
  CommandMetadataSchema,
  isTerminalStatus,
  normalizeOperationName,
  type CommandMetadata,
  type CommandOutcome,
  type CommandProgressEvent,
  type CommandSnapshot,
  type CommandStatus,
  type CommandStatusEvent,
  type ExecutionPolicy
} from '@taskdeck/shared'
import { z } from 'zod'
import {
  CommandCancelledError,
  CommandNotFoundError,
  CommandValidationError,
  DispatcherStoppedError
} from './command-errors'
import { CommandExecutor, type CommandWork, type ExecutionHooks, type ExecutionOutcome } from './command-executor'
import { CommandQueue } from './command-queue'
import { errorMessage, getLogger } from './logger'
import type { NotificationSink } from './notification-sink'
import { createDefaultPolicyStore } from './policy-store'
import { PolicyResolver } from './policy-resolver'
import { ScopeLock, type ScopePermit } from './scope-lock'
import { CommandStatusRegistry, type SnapshotPatch } from './status-registry'

export const DEFAULT_MAX_PARALLEL = 3
export const DEFAULT_RETENTION_MS = 5 * 60 * 1000
export const DEFAULT_PRUNE_INTERVAL_MS = 30 * 1000

const STOPPED_MESSAGE = 'Command dispatcher stopped'

const EnqueueCommandSchema = z.object({
  operationName: z.string().trim().min(1, 'operationName is required'),
  runId: z.string().trim().min(1).nullish(),
  threadScope: z.string().nullish(),
  metadata: CommandMetadataSchema.nullish(),
  priority: z.number().int().default(0),
  work: z.custom<CommandWork>((value) => typeof value === 'function', { message: 'work must be a function' })
})

export type EnqueueCommandInput = z.input<typeof EnqueueCommandSchema>

export type CommandDispatcherOptions = {
  resolver?: PolicyResolver
  registry?: CommandStatusRegistry
  scopeLock?: ScopeLock
  executor?: CommandExecutor
  sinks?: NotificationSink[]
  maxParallel?: number
  retentionMs?: number
  // <= 0 disables the periodic prune; reads still prune lazily
  pruneIntervalMs?: number
  now?: () => Date
}

export type DispatcherState = 'idle' | 'running' | 'stopped'

export type DispatcherStats = {
  state: DispatcherState
  maxParallel: number
  queued: number
  running: number
  tracked: number
  heldScopes: number
}

type DispatchItem = {
  runId: string
  operationName: string
  threadScope: string | null
  priority: number
  metadata: Readonly<CommandMetadata>
  policy: ExecutionPolicy
  work: CommandWork
  controller: AbortController
}

type CompletionWaiter = {
  resolve: (outcome: CommandOutcome) => void
  reject: (error: Error) => void
}

/**
 * Accepts commands, schedules them on a bounded pool of async workers and tracks
 * their live state.
 *
 * Workers pick the highest-priority queued command whose thread scope is free;
 * commands behind a held scope keep their place. Everything that touches the queue,
 * the registry or the scope lock runs synchronously between awaits.
 */
export class CommandDispatcher {
  readonly maxParallel: number
  readonly retentionMs: number
  readonly registry: CommandStatusRegistry

  private readonly resolver: PolicyResolver
  private readonly scopeLock: ScopeLock
  private readonly executor: CommandExecutor
  private readonly sinks: NotificationSink[]
  private readonly pruneIntervalMs: number
  private readonly now: () => Date

  private readonly queue = new CommandQueue<DispatchItem>()
  private readonly running = new Map<string, DispatchItem>()
  private readonly completionWaiters = new Map<string, CompletionWaiter[]>()
  private readonly completedListeners = new Set<(outcome: CommandOutcome) => void>()
  private idleWorkers: Array<() => void> = []
  private workers: Promise<void>[] = []
  private pruneTimer: ReturnType<typeof setInterval> | null = null
  private state: DispatcherState = 'idle'
  private runCounter = 0

  constructor(options: CommandDispatcherOptions = {}) {
    this.resolver = options.resolver ?? new PolicyResolver(createDefaultPolicyStore())
    this.registry = options.registry ?? new CommandStatusRegistry()
    this.scopeLock = options.scopeLock ?? new ScopeLock()
    this.executor = options.executor ?? new CommandExecutor()
    this.sinks = [...(options.sinks ?? [])]
    this.maxParallel = Math.max(1, Math.floor(options.maxParallel ?? DEFAULT_MAX_PARALLEL))
    this.retentionMs = Math.max(0, options.retentionMs ?? DEFAULT_RETENTION_MS)
    this.pruneIntervalMs = options.pruneIntervalMs ?? DEFAULT_PRUNE_INTERVAL_MS
    this.now = options.now ?? (() => new Date())
  }

  start() {
    if (this.state === 'stopped') throw new DispatcherStoppedError()
    if (this.state === 'running') return
    this.state = 'running'

    for (let index = 0; index < this.maxParallel; index += 1) {
      this.workers.push(this.workerLoop(index))
    }

    if (this.pruneIntervalMs > 0) {
      this.pruneTimer = setInterval(() => this.prune(), this.pruneIntervalMs)
      this.pruneTimer.unref?.()
    }
    getLogger().info('dispatcher_started', { maxParallel: this.maxParallel, retentionMs: this.retentionMs })
  }

  /**
   * Cancels queued commands, aborts running ones and waits for every worker to exit.
   * Every tracked command is terminal once this resolves.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') return
    this.state = 'stopped'

    if (this.pruneTimer) {
      clearInterval(this.pruneTimer)
      this.pruneTimer = null
    }

    const queued = this.queue.drain()
    for (const item of queued) {
      item.controller.abort(new CommandCancelledError(STOPPED_MESSAGE))
      this.complete(item, { status: 'cancelled', attempts: 0, message: STOPPED_MESSAGE, failureKind: 'cancelled' })
    }
    for (const item of this.running.values()) {
      item.controller.abort(new CommandCancelledError(STOPPED_MESSAGE))
    }
    this.wakeWorkers()

    const workers = this.workers
    this.workers = []
    await Promise.all(workers)
    getLogger().info('dispatcher_stopped', { cancelledQueued: queued.length })
  }

  enqueue(input: EnqueueCommandInput): string {
    if (this.state === 'stopped') throw new DispatcherStoppedError()

    const parsed = EnqueueCommandSchema.safeParse(input)
    if (!parsed.success) {
      throw new CommandValidationError(
        `Invalid command: ${parsed.error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ')}`,
        parsed.error.issues
      )
    }

    const { operationName, priority, work } = parsed.data
    const metadata: Readonly<CommandMetadata> = Object.freeze({ ...(parsed.data.metadata ?? {}) })
    const threadScope = nonBlank(parsed.data.threadScope)
    const now = this.now()

    this.prune()
    const runId = parsed.data.runId ?? this.generateRunId(operationName, now)
    if (this.registry.has(runId)) {
      throw new CommandValidationError(`Command ${runId} is already tracked`)
    }

    const policy = this.resolver.resolve(operationName, metadata)
    const item: DispatchItem = {
      runId,
      operationName,
      threadScope,
      priority,
      metadata,
      policy,
      work,
      controller: new AbortController()
    }

    this.registry.register({
      runId,
      operationName,
      threadScope,
      status: 'queued',
      priority,
      attempt: 0,
      maxAttempts: policy.maxAttempts,
      timeoutSeconds: policy.timeoutSeconds > 0 ? policy.timeoutSeconds : null,
      currentStep: parseStep(metadata.stepCurrent),
      maxStep: parseStep(metadata.stepMax),
      stepDescription: null,
      errorMessage: null,
      failureKind: null,
      resultMessage: null,
      enqueuedAt: now.toISOString(),
      startedAt: null,
      finishedAt: null,
      metadata,
      agentName: nonBlank(metadata.agentName),
      modelName: nonBlank(metadata.modelName)
    })
    this.queue.enqueue(item)

    getLogger().debug('command_enqueued', { runId, operationName, threadScope, priority })
    this.publish(runId, null)
    this.wakeWorkers()
    return runId
  }

  activeCommands(): CommandSnapshot[] {
    this.prune()
    return this.registry.activeCommands(this.now(), this.retentionMs)
  }

  getCommand(runId: string): CommandSnapshot | undefined {
    this.prune()
    return this.registry.get(runId)
  }

  /**
   * Best-effort cancellation. A queued command is cancelled on the spot; a running
   * one has its signal aborted and ends cancelled once its work yields.
   */
  cancel(runId: string): boolean {
    const snapshot = this.registry.get(runId)
    if (!snapshot || isTerminalStatus(snapshot.status)) return false

    const queued = this.queue.remove(runId)
    if (queued) {
      queued.controller.abort(new CommandCancelledError())
      getLogger().info('command_cancel', { runId, operationName: queued.operationName, state: 'queued' })
      this.complete(queued, { status: 'cancelled', attempts: 0, message: 'Command cancelled', failureKind: 'cancelled' })
      return true
    }

    const running = this.running.get(runId)
    if (!running || running.controller.signal.aborted) return false
    getLogger().info('command_cancel', { runId, operationName: running.operationName, state: snapshot.status })
    running.controller.abort(new CommandCancelledError())
    return true
  }

  waitForCompletion(runId: string, signal?: AbortSignal): Promise<CommandOutcome> {
    const snapshot = this.registry.get(runId)
    if (!snapshot) {
      return Promise.reject(new CommandNotFoundError(runId))
    }
    const finished = outcomeFromSnapshot(snapshot)
    if (finished) {
      return Promise.resolve(finished)
    }
    if (signal?.aborted) {
      return Promise.reject(new CommandCancelledError('Wait for completion aborted'))
    }

    return new Promise<CommandOutcome>((resolve, reject) => {
      const onAbort = () => {
        const waiters = this.completionWaiters.get(runId) ?? []
        const index = waiters.indexOf(waiter)
        if (index !== -1) waiters.splice(index, 1)
        if (waiters.length === 0) this.completionWaiters.delete(runId)
        reject(new CommandCancelledError('Wait for completion aborted'))
      }
      const waiter: CompletionWaiter = {
        resolve: (outcome) => {
          signal?.removeEventListener('abort', onAbort)
          resolve(outcome)
        },
        reject
      }
      const waiters = this.completionWaiters.get(runId) ?? []
      waiters.push(waiter)
      this.completionWaiters.set(runId, waiters)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }

  onCompleted(listener: (outcome: CommandOutcome) => void): () => void {
    this.completedListeners.add(listener)
    return () => {
      this.completedListeners.delete(listener)
    }
  }

  stats(): DispatcherStats {
    return {
      state: this.state,
      maxParallel: this.maxParallel,
      queued: this.queue.size,
      running: this.running.size,
      tracked: this.registry.size,
      heldScopes: this.scopeLock.size
    }
  }

  prune(): string[] {
    const removed = this.registry.prune({ retentionMs: this.retentionMs, now: this.now() })
    if (removed.length) {
      getLogger().debug('command_pruned', { count: removed.length })
    }
    return removed
  }

  private async workerLoop(workerId: number): Promise<void> {
    while (this.state === 'running') {
      const next = this.takeNext()
      if (!next) {
        await new Promise<void>((resolve) => this.idleWorkers.push(resolve))
        continue
      }
      try {
        await this.process(next.item, next.permit, workerId)
      } catch (error) {
        getLogger().error('command_worker_fault', { runId: next.item.runId, workerId, error: errorMessage(error) })
        this.running.delete(next.item.runId)
        this.scopeLock.release(next.permit)
      }
    }
  }

  private takeNext(): { item: DispatchItem; permit: ScopePermit } | null {
    for (const candidate of this.queue.items()) {
      const permit = this.scopeLock.tryAcquire(candidate.threadScope)
      if (permit) {
        this.queue.remove(candidate.runId)
        return { item: candidate, permit }
      }
    }
    return null
  }

  private async process(item: DispatchItem, permit: ScopePermit, workerId: number): Promise<void> {
    this.running.set(item.runId, item)
    let outcome: ExecutionOutcome
    try {
      outcome = await this.executor.run(
        {
          runId: item.runId,
          operationName: item.operationName,
          metadata: item.metadata,
          work: item.work,
          signal: item.controller.signal
        },
        item.policy,
        this.createHooks(item, workerId)
      )
    } catch (error) {
      getLogger().error('command_worker_fault', { runId: item.runId, workerId, error: errorMessage(error) })
      outcome = {
        status: 'failed',
        attempts: this.registry.get(item.runId)?.attempt ?? 0,
        message: errorMessage(error),
        failureKind: 'execution_exception'
      }
    }

    this.running.delete(item.runId)
    this.complete(item, outcome, permit)
    this.wakeWorkers()
  }

  private createHooks(item: DispatchItem, workerId: number): ExecutionHooks {
    return {
      onAttemptStart: (attempt) => {
        const previous = this.registry.get(item.runId)
        this.update(item.runId, {
          status: 'running',
          attempt,
          startedAt: previous?.startedAt ?? this.now().toISOString()
        })
        if (attempt === 1) {
          getLogger().info('command_start', {
            runId: item.runId,
            operationName: item.operationName,
            threadScope: item.threadScope,
            workerId,
            maxAttempts: item.policy.maxAttempts,
            timeoutSeconds: item.policy.timeoutSeconds
          })
        }
        this.publish(item.runId, null)
      },
      onRetryScheduled: (retry) => {
        this.update(item.runId, {
          status: 'retrying',
          errorMessage: retry.failure.message,
          failureKind: retry.failure.kind
        })
        this.publish(item.runId, retry.failure.message)
      },
      onProgress: (progress) => {
        const snapshot = this.update(item.runId, {
          currentStep: progress.step,
          maxStep: progress.maxStep,
          stepDescription: progress.description
        })
        if (!snapshot) return
        this.publishProgress({
          runId: item.runId,
          operationName: item.operationName,
          attempt: snapshot.attempt,
          currentStep: progress.step,
          maxStep: progress.maxStep,
          stepDescription: progress.description,
          timestamp: this.now().toISOString()
        })
      }
    }
  }

  private complete(item: DispatchItem, outcome: ExecutionOutcome, permit?: ScopePermit) {
    const snapshot = this.update(item.runId, {
      status: outcome.status,
      attempt: outcome.attempts,
      finishedAt: this.now().toISOString(),
      resultMessage: outcome.status === 'completed' ? outcome.message : null,
      errorMessage: outcome.status === 'completed' ? null : outcome.message,
      failureKind: outcome.failureKind
    })
    if (permit) {
      this.scopeLock.release(permit)
    }

    getLogger().info('command_end', {
      runId: item.runId,
      operationName: item.operationName,
      status: outcome.status,
      attempts: outcome.attempts,
      failureKind: outcome.failureKind,
      durationMs: snapshot?.startedAt && snapshot.finishedAt ? Date.parse(snapshot.finishedAt) - Date.parse(snapshot.startedAt) : null
    })
    this.publish(item.runId, outcome.message)

    const result: CommandOutcome = {
      runId: item.runId,
      operationName: item.operationName,
      status: outcome.status,
      attempts: outcome.attempts,
      message: outcome.message,
      failureKind: outcome.failureKind
    }
    const waiters = this.completionWaiters.get(item.runId) ?? []
    this.completionWaiters.delete(item.runId)
    for (const waiter of waiters) {
      waiter.resolve(result)
    }
    for (const listener of this.completedListeners) {
      try {
        listener(result)
      } catch (error) {
        getLogger().warn('command_completed_listener_error', { runId: item.runId, error: errorMessage(error) })
      }
    }
  }

  private update(runId: string, patch: SnapshotPatch) {
    return this.registry.update(runId, patch)
  }

  private publish(runId: string, message: string | null) {
    const snapshot = this.registry.get(runId)
    if (!snapshot) return
    const event: CommandStatusEvent = {
      runId,
      operationName: snapshot.operationName,
      status: snapshot.status,
      attempt: snapshot.attempt,
      message,
      failureKind: snapshot.failureKind,
      timestamp: this.now().toISOString()
    }
    for (const sink of this.sinks) {
      try {
        const pending = sink.notify(event)
        if (pending instanceof Promise) {
          void pending.catch((error: unknown) => this.logSinkError(event.runId, event.status, error))
        }
      } catch (error) {
        this.logSinkError(event.runId, event.status, error)
      }
    }
  }

  private publishProgress(event: CommandProgressEvent) {
    for (const sink of this.sinks) {
      if (!sink.progress) continue
      try {
        const pending = sink.progress(event)
        if (pending instanceof Promise) {
          void pending.catch((error: unknown) => this.logSinkError(event.runId, 'progress', error))
        }
      } catch (error) {
        this.logSinkError(event.runId, 'progress', error)
      }
    }
  }

  private logSinkError(runId: string, status: CommandStatus | 'progress', error: unknown) {
    getLogger().warn('command_sink_error', { runId, status, error: errorMessage(error) })
  }

  private wakeWorkers() {
    const waiting = this.idleWorkers
    this.idleWorkers = []
    for (const wake of waiting) wake()
  }

  private generateRunId(operationName: string, now: Date): string {
    this.runCounter += 1
    const prefix = normalizeOperationName(operationName) || 'command'
    return `${prefix}_${formatRunTimestamp(now)}_${this.runCounter}`
  }
}

function formatRunTimestamp(date: Date): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, '0')
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    pad(date.getUTCMilliseconds(), 3)
  )
}

function nonBlank(value: string | null | undefined): string | null {
  const trimmed = value?.trim()
  return trimmed ? trimmed : null
}

function parseStep(value: string | undefined): number | null {
  if (value === undefined || !/^-?\d+$/.test(value.trim())) return null
  return Number.parseInt(value, 10)
}

function outcomeFromSnapshot(snapshot: CommandSnapshot): CommandOutcome | null {
  if (!isTerminalStatus(snapshot.status)) return null
  return {
    runId: snapshot.runId,
    operationName: snapshot.operationName,
    status: snapshot.status,
    attempts: snapshot.attempt,
    message: snapshot.status === 'completed' ? snapshot.resultMessage : snapshot.errorMessage,
    failureKind: snapshot.failureKind
  }
}
