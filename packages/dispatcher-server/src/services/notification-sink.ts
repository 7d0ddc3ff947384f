import type { CommandProgressEvent, CommandStatusEvent } from '@taskdeck/shared'

/**
 * Receives one event per command status transition (queued, running, retrying and
 * the terminal status), and step progress when the sink opts in. A sink that throws
 * or rejects is logged and skipped.
 */
export interface NotificationSink {
  notify(event: CommandStatusEvent): void | Promise<void>
  progress?(event: CommandProgressEvent): void | Promise<void>
}
