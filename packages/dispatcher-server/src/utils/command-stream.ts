import type { CommandStreamFrame } from '@taskdeck/shared'
import type { CommandTelemetryService } from '../services/command-telemetry'

/**
 * Forwards status transitions and step progress from telemetry as stream frames.
 * Returns a function that detaches both listeners.
 */
export function subscribeCommandFrames(
  telemetry: CommandTelemetryService,
  send: (frame: CommandStreamFrame) => void
): () => void {
  const offStatus = telemetry.subscribe((event) => send({ type: 'command_status', event }))
  const offProgress = telemetry.subscribeProgress((event) => send({ type: 'command_progress', event }))
  return () => {
    offStatus()
    offProgress()
  }
}
