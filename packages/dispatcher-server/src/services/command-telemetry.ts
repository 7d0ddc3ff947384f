import { EventEmitter } from 'node:events'
import {
  isTerminalStatus,
  type CommandProgressEvent,
  type CommandStatus,
  type CommandStatusEvent
} from '@taskdeck/shared'
import { getLogger } from './logger'
import type { NotificationSink } from './notification-sink'

type LabelValue = string | number | boolean | null | undefined

type MetricLabels = Record<string, LabelValue>

type HistogramBucket = {
  count: number
  sum: number
  min: number
  max: number
}

export type TelemetryMetricsSnapshot = {
  counters: Record<string, number>
  histograms: Record<string, HistogramBucket>
}

type SubscriptionOptions = {
  statuses?: CommandStatus[]
}

export class CommandTelemetryService implements NotificationSink {
  private readonly emitter = new EventEmitter()
  private readonly counters = new Map<string, number>()
  private readonly histograms = new Map<string, HistogramBucket>()
  private readonly runStartedAt = new Map<string, number>()

  notify(event: CommandStatusEvent) {
    try {
      this.logEvent(event)
      this.trackMetrics(event)
    } catch (error) {
      getLogger().warn('command_telemetry_process_error', {
        error: error instanceof Error ? error.message : String(error),
        runId: event.runId,
        status: event.status
      })
    }

    this.emitter.emit('event', event)
  }

  progress(event: CommandProgressEvent) {
    getLogger().debug('command_progress', {
      runId: event.runId,
      operationName: event.operationName,
      attempt: event.attempt,
      currentStep: event.currentStep,
      maxStep: event.maxStep
    })
    this.emitter.emit('progress', event)
  }

  subscribe(listener: (event: CommandStatusEvent) => void, options?: SubscriptionOptions): () => void {
    const allowed = options?.statuses ? new Set(options.statuses) : null
    const handler = (event: CommandStatusEvent) => {
      if (!allowed || allowed.has(event.status)) {
        listener(event)
      }
    }
    this.emitter.on('event', handler)
    return () => {
      this.emitter.off('event', handler)
    }
  }

  subscribeProgress(listener: (event: CommandProgressEvent) => void): () => void {
    this.emitter.on('progress', listener)
    return () => {
      this.emitter.off('progress', listener)
    }
  }

  listenerCount() {
    return this.emitter.listenerCount('event') + this.emitter.listenerCount('progress')
  }

  getMetricsSnapshot(): TelemetryMetricsSnapshot {
    const counters: Record<string, number> = {}
    for (const [key, value] of this.counters.entries()) {
      counters[key] = value
    }
    const histograms: Record<string, HistogramBucket> = {}
    for (const [key, bucket] of this.histograms.entries()) {
      histograms[key] = { ...bucket }
    }
    return { counters, histograms }
  }

  resetForTest() {
    this.counters.clear()
    this.histograms.clear()
    this.runStartedAt.clear()
    this.emitter.removeAllListeners()
  }

  private logEvent(event: CommandStatusEvent) {
    const base = {
      runId: event.runId,
      operationName: event.operationName,
      attempt: event.attempt
    }
    switch (event.status) {
      case 'retrying':
        getLogger().info('command_status_retrying', { ...base, message: event.message })
        break
      case 'failed':
        getLogger().warn('command_status_failed', { ...base, failureKind: event.failureKind, message: event.message })
        break
      default:
        getLogger().debug(`command_status_${event.status}`, base)
        break
    }
  }

  private trackMetrics(event: CommandStatusEvent) {
    const timestamp = Date.parse(event.timestamp)
    this.recordCounter('command.status', { status: event.status, operation: event.operationName })

    if (event.status === 'running' && !this.runStartedAt.has(event.runId)) {
      this.runStartedAt.set(event.runId, timestamp)
    }
    if (event.status === 'retrying') {
      this.recordCounter('command.retry', { operation: event.operationName })
    }
    if (isTerminalStatus(event.status)) {
      const startedAt = this.runStartedAt.get(event.runId)
      this.runStartedAt.delete(event.runId)
      if (startedAt !== undefined && Number.isFinite(timestamp)) {
        this.recordHistogram('command.duration_ms', Math.max(0, timestamp - startedAt), {
          operation: event.operationName,
          status: event.status
        })
      }
    }
  }

  private recordCounter(name: string, labels?: MetricLabels) {
    const key = this.metricKey(name, labels)
    const next = (this.counters.get(key) ?? 0) + 1
    this.counters.set(key, next)
    getLogger().debug('command_metric', { kind: 'counter', name, value: next, labels })
  }

  private recordHistogram(name: string, value: number, labels?: MetricLabels) {
    const key = this.metricKey(name, labels)
    const bucket = this.histograms.get(key) ?? { count: 0, sum: 0, min: Number.POSITIVE_INFINITY, max: 0 }
    bucket.count += 1
    bucket.sum += value
    bucket.min = Math.min(bucket.min, value)
    bucket.max = Math.max(bucket.max, value)
    this.histograms.set(key, bucket)
    getLogger().debug('command_metric', { kind: 'histogram', name, value, labels })
  }

  private metricKey(name: string, labels?: MetricLabels) {
    if (!labels || Object.keys(labels).length === 0) return name
    const serialized = Object.entries(labels)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${String(value)}`)
      .sort()
      .join('|')
    return serialized ? `${name}|${serialized}` : name
  }
}

let telemetryService: CommandTelemetryService | null = null

export function getCommandTelemetry(): CommandTelemetryService {
  if (!telemetryService) {
    telemetryService = new CommandTelemetryService()
  }
  return telemetryService
}

export function __resetCommandTelemetryForTest() {
  telemetryService?.resetForTest()
}
