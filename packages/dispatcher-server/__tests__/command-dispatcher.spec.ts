// @vitest-environment node
import { describe, it, expect, vi, afterEach } from 'vitest'
import type { CommandProgressEvent, CommandStatusEvent, ExecutionPolicy } from '@taskdeck/shared'
import { CommandDispatcher, type CommandDispatcherOptions } from '../src/services/command-dispatcher'
import {
  CommandExecutor,
  type CommandWork,
  type ExecutionHooks,
  type ExecutionOutcome,
  type ExecutionRequest
} from '../src/services/command-executor'
import { CommandValidationError, DispatcherStoppedError } from '../src/services/command-errors'
import type { NotificationSink } from '../src/services/notification-sink'
import { PolicyStore } from '../src/services/policy-store'
import { PolicyResolver } from '../src/services/policy-resolver'

vi.mock('../src/services/logger', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/services/logger')>()
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
  return { ...actual, getLogger: () => logger }
})

function deferred<T>() {
  let settle: (value: T) => void = () => {}
  const promise = new Promise<T>((resolve) => {
    settle = resolve
  })
  return { promise, resolve: (value: T) => settle(value) }
}

// resolves only once the run signal aborts
const untilAborted: CommandWork = (context) =>
  new Promise((resolve) => {
    context.signal.addEventListener('abort', () => resolve({ success: false }), { once: true })
  })

class RecordingSink implements NotificationSink {
  readonly events: CommandStatusEvent[] = []
  notify(event: CommandStatusEvent) {
    this.events.push(event)
  }
  statuses(runId: string) {
    return this.events.filter((event) => event.runId === runId).map((event) => event.status)
  }
}

describe('CommandDispatcher', () => {
  let dispatcher: CommandDispatcher

  function createDispatcher(options: CommandDispatcherOptions = {}) {
    dispatcher = new CommandDispatcher({ maxParallel: 1, pruneIntervalMs: 0, ...options })
    return dispatcher
  }

  afterEach(async () => {
    await dispatcher.stop()
  })

  it('starts the higher-priority command first when both are queued together', async () => {
    const started: string[] = []
    const work = (label: string): CommandWork => async () => {
      started.push(label)
      return { success: true }
    }
    createDispatcher().start()

    dispatcher.enqueue({ operationName: 'log_analyze', runId: 'r2', priority: 1, work: work('r2') })
    dispatcher.enqueue({ operationName: 'story_write', runId: 'r1', priority: 2, work: work('r1') })
    await dispatcher.waitForCompletion('r2')

    expect(started).toEqual(['r1', 'r2'])
  })

  it('runs commands sharing a thread scope one at a time, in submission order', async () => {
    const started: string[] = []
    let activeScoped = 0
    let maxScoped = 0
    let active = 0
    let maxActive = 0
    const work = (label: string, scoped: boolean): CommandWork => async () => {
      started.push(label)
      active += 1
      maxActive = Math.max(maxActive, active)
      if (scoped) {
        activeScoped += 1
        maxScoped = Math.max(maxScoped, activeScoped)
      }
      await new Promise((resolve) => setTimeout(resolve, 5))
      if (scoped) activeScoped -= 1
      active -= 1
      return { success: true }
    }
    createDispatcher({ maxParallel: 3 }).start()

    for (const label of ['a', 'b', 'c']) {
      dispatcher.enqueue({ operationName: 'append_log', runId: label, threadScope: 'story-1', work: work(label, true) })
    }
    dispatcher.enqueue({ operationName: 'tts_render', runId: 'u', work: work('u', false) })

    await Promise.all(['a', 'b', 'c', 'u'].map((runId) => dispatcher.waitForCompletion(runId)))

    expect(maxScoped).toBe(1)
    expect(maxActive).toBe(2)
    expect(started.filter((label) => label !== 'u')).toEqual(['a', 'b', 'c'])
    expect(started.slice(0, 2)).toEqual(['a', 'u'])
    expect(dispatcher.stats().heldScopes).toBe(0)
  })

  it('cancels a queued command without ever running it', async () => {
    const blocker = deferred<{ success: boolean }>()
    const victim = vi.fn<CommandWork>(async () => ({ success: true }))
    createDispatcher().start()

    dispatcher.enqueue({ operationName: 'story_write', runId: 'blocker', work: () => blocker.promise })
    dispatcher.enqueue({ operationName: 'story_write', runId: 'victim', work: victim })
    await vi.waitFor(() => expect(dispatcher.getCommand('blocker')?.status).toBe('running'))

    expect(dispatcher.cancel('victim')).toBe(true)
    expect(dispatcher.cancel('victim')).toBe(false)

    const snapshot = dispatcher.getCommand('victim')
    expect(snapshot?.status).toBe('cancelled')
    expect(snapshot?.attempt).toBe(0)
    expect(snapshot?.startedAt).toBeNull()
    expect(await dispatcher.waitForCompletion('victim')).toEqual({
      runId: 'victim',
      operationName: 'story_write',
      status: 'cancelled',
      attempts: 0,
      message: 'Command cancelled',
      failureKind: 'cancelled'
    })

    blocker.resolve({ success: true })
    await dispatcher.waitForCompletion('blocker')
    expect(victim).not.toHaveBeenCalled()
  })

  it('cancels a running command through its signal', async () => {
    createDispatcher().start()
    dispatcher.enqueue({ operationName: 'log_analyze', runId: 'long', work: untilAborted })
    await vi.waitFor(() => expect(dispatcher.getCommand('long')?.status).toBe('running'))

    expect(dispatcher.cancel('long')).toBe(true)
    const outcome = await dispatcher.waitForCompletion('long')

    expect(outcome.status).toBe('cancelled')
    expect(outcome.attempts).toBe(1)
    expect(dispatcher.getCommand('long')?.failureKind).toBe('cancelled')
    expect(dispatcher.cancel('long')).toBe(false)
  })

  it('keeps runs healthy when sinks throw or reject', async () => {
    const recording = new RecordingSink()
    const throwing: NotificationSink = {
      notify: () => {
        throw new Error('sink down')
      }
    }
    const rejecting: NotificationSink = {
      notify: async () => {
        throw new Error('sink offline')
      }
    }
    createDispatcher({ sinks: [throwing, rejecting, recording] }).start()

    dispatcher.enqueue({ operationName: 'summarize_story', runId: 's1', work: async () => ({ success: true, message: 'ok' }) })
    const outcome = await dispatcher.waitForCompletion('s1')

    expect(outcome.status).toBe('completed')
    expect(outcome.message).toBe('ok')
    expect(recording.statuses('s1')).toEqual(['queued', 'running', 'completed'])
  })

  it('records an executor fault as a failed run and keeps the worker alive', async () => {
    class CrashingExecutor extends CommandExecutor {
      override async run(request: ExecutionRequest, policy: ExecutionPolicy, hooks?: ExecutionHooks): Promise<ExecutionOutcome> {
        if (request.operationName === 'crash') {
          throw new Error('executor crashed')
        }
        return super.run(request, policy, hooks)
      }
    }
    createDispatcher({ executor: new CrashingExecutor() }).start()

    dispatcher.enqueue({ operationName: 'crash', runId: 'bad', work: async () => ({ success: true }) })
    dispatcher.enqueue({ operationName: 'summarize_story', runId: 'good', work: async () => ({ success: true }) })

    const bad = await dispatcher.waitForCompletion('bad')
    const good = await dispatcher.waitForCompletion('good')

    expect(bad).toEqual({
      runId: 'bad',
      operationName: 'crash',
      status: 'failed',
      attempts: 0,
      message: 'executor crashed',
      failureKind: 'execution_exception'
    })
    expect(good.status).toBe('completed')
  })

  it('reflects retries and progress in the snapshot', async () => {
    const recording = new RecordingSink()
    const resolver = new PolicyResolver(
      PolicyStore.fromInput({ commands: { flaky: { maxAttempts: 2, retryDelayBaseSeconds: 0, timeoutSeconds: 0 } } })
    )
    const onCompleted = vi.fn()
    createDispatcher({ resolver, sinks: [recording] }).start()
    dispatcher.onCompleted(onCompleted)

    let calls = 0
    dispatcher.enqueue({
      operationName: 'Flaky',
      runId: 'f1',
      work: async (context) => {
        calls += 1
        if (calls === 1) throw new Error('first try')
        context.reportProgress(3, 4, 'render')
        return { success: true, message: 'ok' }
      }
    })
    await dispatcher.waitForCompletion('f1')

    expect(recording.statuses('f1')).toEqual(['queued', 'running', 'retrying', 'running', 'completed'])
    const retrying = recording.events.find((event) => event.status === 'retrying')
    expect(retrying?.message).toBe('first try')
    expect(retrying?.attempt).toBe(1)

    const snapshot = dispatcher.getCommand('f1')
    expect(snapshot).toMatchObject({
      status: 'completed',
      attempt: 2,
      maxAttempts: 2,
      timeoutSeconds: null,
      currentStep: 3,
      maxStep: 4,
      stepDescription: 'render',
      resultMessage: 'ok',
      errorMessage: null,
      failureKind: null
    })
    expect(onCompleted).toHaveBeenCalledWith({
      runId: 'f1',
      operationName: 'Flaky',
      status: 'completed',
      attempts: 2,
      message: 'ok',
      failureKind: null
    })
  })

  it('seeds the queued snapshot from metadata and generates run ids', () => {
    createDispatcher({ now: () => new Date('2026-03-04T05:06:07.089Z') })

    const runId = dispatcher.enqueue({
      operationName: 'SummarizeStory',
      threadScope: '   ',
      metadata: { agentName: 'writer', modelName: 'model-test', stepCurrent: '2', stepMax: 'five' },
      work: async () => ({ success: true })
    })

    expect(runId).toBe('summarize_story_20260304050607089_1')
    expect(dispatcher.getCommand(runId)).toMatchObject({
      status: 'queued',
      threadScope: null,
      priority: 0,
      attempt: 0,
      maxAttempts: 1,
      timeoutSeconds: 20,
      currentStep: 2,
      maxStep: null,
      agentName: 'writer',
      modelName: 'model-test',
      enqueuedAt: '2026-03-04T05:06:07.089Z'
    })
  })

  it('rejects malformed input synchronously', () => {
    createDispatcher()
    const work: CommandWork = async () => ({ success: true })

    expect(() => dispatcher.enqueue({ operationName: '  ', work })).toThrow(CommandValidationError)
    expect(() => dispatcher.enqueue({ operationName: 'x', priority: 1.5, work })).toThrow(CommandValidationError)

    dispatcher.enqueue({ operationName: 'x', runId: 'dup', work })
    expect(() => dispatcher.enqueue({ operationName: 'x', runId: 'dup', work })).toThrow('Command dup is already tracked')
  })

  it('drops finished commands once the retention window passes', async () => {
    let clock = new Date('2026-01-01T00:00:00.000Z')
    createDispatcher({ retentionMs: 1000, now: () => clock }).start()

    dispatcher.enqueue({ operationName: 'summarize_story', runId: 'old', work: async () => ({ success: true }) })
    await dispatcher.waitForCompletion('old')
    expect(dispatcher.activeCommands().map((entry) => entry.runId)).toEqual(['old'])

    clock = new Date('2026-01-01T00:00:01.001Z')
    expect(dispatcher.activeCommands()).toEqual([])
    expect(dispatcher.getCommand('old')).toBeUndefined()
    // the run id is free again
    expect(dispatcher.enqueue({ operationName: 'summarize_story', runId: 'old', work: async () => ({ success: true }) })).toBe('old')
  })

  it('stops by cancelling running and queued commands and settling their waiters', async () => {
    createDispatcher().start()
    dispatcher.enqueue({ operationName: 'log_analyze', runId: 'running-one', work: untilAborted })
    dispatcher.enqueue({ operationName: 'log_analyze', runId: 'queued-one', work: untilAborted })
    const runningWait = dispatcher.waitForCompletion('running-one')
    const queuedWait = dispatcher.waitForCompletion('queued-one')
    await vi.waitFor(() => expect(dispatcher.getCommand('running-one')?.status).toBe('running'))

    await dispatcher.stop()

    await expect(queuedWait).resolves.toEqual({
      runId: 'queued-one',
      operationName: 'log_analyze',
      status: 'cancelled',
      attempts: 0,
      message: 'Command dispatcher stopped',
      failureKind: 'cancelled'
    })
    await expect(runningWait).resolves.toMatchObject({ status: 'cancelled', attempts: 1, failureKind: 'cancelled' })
    expect(dispatcher.stats()).toMatchObject({ state: 'stopped', queued: 0, running: 0, heldScopes: 0 })
    expect(() => dispatcher.enqueue({ operationName: 'x', work: untilAborted })).toThrow(DispatcherStoppedError)
  })

  it('pushes step progress to sinks without changing the status', async () => {
    const progress: CommandProgressEvent[] = []
    const listening: NotificationSink = {
      notify: () => {},
      progress: (event) => {
        progress.push(event)
      }
    }
    const broken: NotificationSink = {
      notify: () => {},
      progress: () => {
        throw new Error('sink down')
      }
    }
    createDispatcher({ sinks: [broken, listening], now: () => new Date('2026-02-01T00:00:00.000Z') }).start()

    const statusDuringWork: Array<string | undefined> = []
    dispatcher.enqueue({
      operationName: 'render_audio',
      runId: 'p1',
      work: async (context) => {
        context.reportProgress(1, 3, 'chunking')
        context.reportProgress(2, 3)
        statusDuringWork.push(dispatcher.getCommand('p1')?.status)
        return { success: true }
      }
    })
    await dispatcher.waitForCompletion('p1')

    expect(progress).toEqual([
      {
        runId: 'p1',
        operationName: 'render_audio',
        attempt: 1,
        currentStep: 1,
        maxStep: 3,
        stepDescription: 'chunking',
        timestamp: '2026-02-01T00:00:00.000Z'
      },
      {
        runId: 'p1',
        operationName: 'render_audio',
        attempt: 1,
        currentStep: 2,
        maxStep: 3,
        stepDescription: null,
        timestamp: '2026-02-01T00:00:00.000Z'
      }
    ])
    expect(statusDuringWork).toEqual(['running'])
    expect(dispatcher.getCommand('p1')?.status).toBe('completed')
  })

  it('lets a lower-priority command on a free scope pass one waiting on a held scope', async () => {
    const started: string[] = []
    const finished: string[] = []
    const holder = deferred<{ success: boolean }>()
    const seenByA2: Array<string | undefined> = []
    createDispatcher({ maxParallel: 2 }).start()
    dispatcher.onCompleted((outcome) => finished.push(outcome.runId))

    dispatcher.enqueue({
      operationName: 'story_write',
      runId: 'a1',
      threadScope: 'story-s',
      work: () => {
        started.push('a1')
        return holder.promise
      }
    })
    await vi.waitFor(() => expect(dispatcher.getCommand('a1')?.status).toBe('running'))

    dispatcher.enqueue({
      operationName: 'story_write',
      runId: 'a2',
      threadScope: 'story-s',
      priority: 5,
      work: async () => {
        started.push('a2')
        seenByA2.push(dispatcher.getCommand('a1')?.status)
        return { success: true }
      }
    })
    dispatcher.enqueue({
      operationName: 'log_analyze',
      runId: 'b',
      threadScope: 'story-t',
      priority: 1,
      work: async () => {
        started.push('b')
        return { success: true }
      }
    })

    await dispatcher.waitForCompletion('b')
    expect(started).toEqual(['a1', 'b'])
    expect(dispatcher.getCommand('a2')?.status).toBe('queued')

    holder.resolve({ success: true })
    await dispatcher.waitForCompletion('a2')

    expect(started).toEqual(['a1', 'b', 'a2'])
    expect(finished).toEqual(['b', 'a1', 'a2'])
    expect(seenByA2).toEqual(['completed'])
  })

  it('rejects waits for unknown commands', async () => {
    createDispatcher()
    await expect(dispatcher.waitForCompletion('nope')).rejects.toThrow('Unknown command nope')
  })
})
