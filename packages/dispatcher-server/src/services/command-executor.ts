import type {
  CommandFailureKind,
  CommandMetadata,
  ExecutionPolicy,
  TerminalCommandStatus
} from '@taskdeck/shared'
import { abortReason, sleep, startTimer } from '../utils/timers'
import { CommandTimeoutError } from './command-errors'
import { errorMessage, getLogger } from './logger'

export type CommandWorkResult = {
  success: boolean
  message?: string | null
}

export type CommandContext = {
  readonly runId: string
  readonly operationName: string
  readonly metadata: Readonly<CommandMetadata>
  readonly attempt: number
  readonly maxAttempts: number
  readonly timeoutSeconds: number
  // aborts on timeout or cancellation of the run
  readonly signal: AbortSignal
  reportProgress: (step: number, maxStep: number, description?: string) => void
  throwIfCancelled: () => void
}

export type CommandWork = (context: CommandContext) => Promise<CommandWorkResult>

export type ExecutionRequest = {
  runId: string
  operationName: string
  metadata: Readonly<CommandMetadata>
  work: CommandWork
  signal: AbortSignal
}

export type AttemptFailure = {
  kind: Extract<CommandFailureKind, 'timeout' | 'execution_exception' | 'failure_result'>
  message: string
}

export type RetryScheduled = {
  attempt: number
  nextAttempt: number
  delaySeconds: number
  failure: AttemptFailure
}

export type ProgressReport = {
  step: number
  maxStep: number
  description: string | null
}

export type ExecutionHooks = {
  onAttemptStart?: (attempt: number) => void
  onRetryScheduled?: (retry: RetryScheduled) => void
  onProgress?: (progress: ProgressReport) => void
}

export type ExecutionOutcome = {
  status: TerminalCommandStatus
  attempts: number
  message: string | null
  failureKind: CommandFailureKind | null
}

type ExecutorState =
  | { phase: 'running'; attempt: number }
  | { phase: 'retrying'; attempt: number; failure: AttemptFailure }
  | { phase: 'done'; outcome: ExecutionOutcome }

type AttemptResult =
  | { kind: 'success'; message: string | null }
  | { kind: 'cancelled' }
  | { kind: 'failure'; failure: AttemptFailure }

const CANCELLED_MESSAGE = 'Command cancelled'

export function computeRetryDelaySeconds(policy: ExecutionPolicy, attempt: number): number {
  const base = Math.max(0, policy.retryDelayBaseSeconds)
  const cap = Math.max(0, policy.retryDelayMaxSeconds)
  const raw = policy.exponentialBackoff ? base * 2 ** Math.max(0, attempt - 1) : base
  return Math.min(cap, raw)
}

export function isRetryable(policy: ExecutionPolicy, failure: AttemptFailure): boolean {
  return failure.kind === 'failure_result' ? policy.retryOnFailureResult : policy.retryOnException
}

/**
 * Runs one command under its resolved policy.
 *
 * Drives `running -> retrying -> running -> ... -> done` explicitly; every wait in the
 * loop (the work itself, the timeout, the backoff) observes the run's abort signal.
 * Never throws: faults in the work function become classified outcomes.
 */
export class CommandExecutor {
  async run(request: ExecutionRequest, policy: ExecutionPolicy, hooks: ExecutionHooks = {}): Promise<ExecutionOutcome> {
    const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts))
    let state: ExecutorState = { phase: 'running', attempt: 1 }

    while (state.phase !== 'done') {
      state =
        state.phase === 'running'
          ? await this.runAttempt(request, policy, maxAttempts, state.attempt, hooks)
          : await this.backoff(request, policy, maxAttempts, state.attempt, state.failure, hooks)
    }

    return state.outcome
  }

  private async runAttempt(
    request: ExecutionRequest,
    policy: ExecutionPolicy,
    maxAttempts: number,
    attempt: number,
    hooks: ExecutionHooks
  ): Promise<ExecutorState> {
    if (request.signal.aborted) {
      return this.cancelled(attempt - 1)
    }

    this.callHook('onAttemptStart', request, () => hooks.onAttemptStart?.(attempt))
    const result = await this.invoke(request, policy, maxAttempts, attempt, hooks)

    if (result.kind === 'success') {
      return {
        phase: 'done',
        outcome: { status: 'completed', attempts: attempt, message: result.message, failureKind: null }
      }
    }
    if (result.kind === 'cancelled') {
      return this.cancelled(attempt)
    }

    const { failure } = result
    const retryable = isRetryable(policy, failure)
    getLogger().warn('command_attempt_failed', {
      runId: request.runId,
      operationName: request.operationName,
      attempt,
      maxAttempts,
      kind: failure.kind,
      retryable,
      error: failure.message
    })

    if (retryable && attempt < maxAttempts) {
      return { phase: 'retrying', attempt, failure }
    }

    return {
      phase: 'done',
      outcome: {
        status: 'failed',
        attempts: attempt,
        message: failure.message,
        failureKind: retryable && maxAttempts > 1 ? 'policy_exhausted' : failure.kind
      }
    }
  }

  private async backoff(
    request: ExecutionRequest,
    policy: ExecutionPolicy,
    maxAttempts: number,
    attempt: number,
    failure: AttemptFailure,
    hooks: ExecutionHooks
  ): Promise<ExecutorState> {
    const delaySeconds = computeRetryDelaySeconds(policy, attempt)
    this.callHook('onRetryScheduled', request, () =>
      hooks.onRetryScheduled?.({ attempt, nextAttempt: attempt + 1, delaySeconds, failure })
    )

    getLogger().warn('command_retry', {
      runId: request.runId,
      operationName: request.operationName,
      nextAttempt: attempt + 1,
      maxAttempts,
      delaySeconds
    })

    try {
      await sleep(delaySeconds * 1000, request.signal)
    } catch {
      // the only rejection path of sleep is the run signal aborting
      return this.cancelled(attempt)
    }

    return { phase: 'running', attempt: attempt + 1 }
  }

  private async invoke(
    request: ExecutionRequest,
    policy: ExecutionPolicy,
    maxAttempts: number,
    attempt: number,
    hooks: ExecutionHooks
  ): Promise<AttemptResult> {
    const controller = new AbortController()
    let timedOut = false

    const onRunAbort = () => controller.abort(abortReason(request.signal))
    request.signal.addEventListener('abort', onRunAbort, { once: true })

    const cancelTimer =
      policy.timeoutSeconds > 0
        ? startTimer(() => {
            timedOut = true
            controller.abort(new CommandTimeoutError(policy.timeoutSeconds))
          }, policy.timeoutSeconds * 1000)
        : undefined

    let markAborted = () => {}
    const aborted = new Promise<{ type: 'aborted' }>((resolve) => {
      markAborted = () => resolve({ type: 'aborted' })
    })
    const onAttemptAbort = () => markAborted()
    controller.signal.addEventListener('abort', onAttemptAbort, { once: true })

    const context: CommandContext = {
      runId: request.runId,
      operationName: request.operationName,
      metadata: request.metadata,
      attempt,
      maxAttempts,
      timeoutSeconds: policy.timeoutSeconds,
      signal: controller.signal,
      reportProgress: (step, maxStep, description) => {
        this.callHook('onProgress', request, () =>
          hooks.onProgress?.({ step, maxStep, description: description ?? null })
        )
      },
      throwIfCancelled: () => {
        if (controller.signal.aborted) {
          throw abortReason(controller.signal)
        }
      }
    }

    // async wrapper turns a synchronous throw into a rejection
    const settledWork = (async () => request.work(context))().then(
      (result) => ({ type: 'result' as const, result }),
      (error: unknown) => ({ type: 'error' as const, error })
    )

    try {
      const settled = await Promise.race([settledWork, aborted])

      if (settled.type === 'aborted') {
        void settledWork.then((late) => {
          getLogger().debug('command_work_settled_after_abort', {
            runId: request.runId,
            attempt,
            outcome: late.type === 'result' ? (late.result?.success ? 'success' : 'failure') : 'error'
          })
        })
      }

      if (timedOut) {
        return { kind: 'failure', failure: { kind: 'timeout', message: new CommandTimeoutError(policy.timeoutSeconds).message } }
      }
      if (request.signal.aborted) {
        return { kind: 'cancelled' }
      }
      if (settled.type === 'error') {
        return { kind: 'failure', failure: { kind: 'execution_exception', message: errorMessage(settled.error) } }
      }
      if (settled.type === 'aborted') {
        // attempt signal aborted without timeout or run cancellation; treat like a fault
        return { kind: 'failure', failure: { kind: 'execution_exception', message: abortReason(controller.signal).message } }
      }

      const { result } = settled
      const message = typeof result?.message === 'string' ? result.message : null
      if (result?.success === true) {
        return { kind: 'success', message }
      }
      return { kind: 'failure', failure: { kind: 'failure_result', message: message ?? 'Command reported failure' } }
    } finally {
      cancelTimer?.()
      request.signal.removeEventListener('abort', onRunAbort)
      controller.signal.removeEventListener('abort', onAttemptAbort)
    }
  }

  private cancelled(attempts: number): ExecutorState {
    return {
      phase: 'done',
      outcome: { status: 'cancelled', attempts, message: CANCELLED_MESSAGE, failureKind: 'cancelled' }
    }
  }

  private callHook(name: keyof ExecutionHooks, request: ExecutionRequest, fn: () => void) {
    try {
      fn()
    } catch (error) {
      getLogger().warn('command_hook_error', {
        runId: request.runId,
        hook: name,
        error: errorMessage(error)
      })
    }
  }
}
