import type { CommandStreamFrame } from '@taskdeck/shared'
import { defineEventHandler, getHeader } from 'h3'
import { getCommandTelemetry } from '../../../../src/services/command-telemetry'
import { getDispatcherConfig } from '../../../../src/services/config'
import { getDispatcher } from '../../../../src/services/dispatcher-container'
import { genCorrelationId, getLogger } from '../../../../src/services/logger'
import { subscribeCommandFrames } from '../../../../src/utils/command-stream'
import { createSse } from '../../../../src/utils/sse'

export default defineEventHandler(async (event) => {
  const correlationId = getHeader(event, 'x-correlation-id') || genCorrelationId()
  const sse = createSse(event, { correlationId, heartbeatMs: getDispatcherConfig().sseHeartbeatMs })
  const log = getLogger()

  // subscribe before the initial list so no transition falls between the two
  const unsubscribe = subscribeCommandFrames(getCommandTelemetry(), (frame) => {
    void sse.sendNamed(frame.type, frame)
  })
  sse.onClose(() => {
    unsubscribe()
    log.info('command_stream_closed', { correlationId })
  })

  const initial: CommandStreamFrame = { type: 'command_list', commands: getDispatcher().activeCommands() }
  await sse.sendNamed(initial.type, initial)
  log.info('command_stream_open', { correlationId, commands: initial.commands.length })

  // held open until the client disconnects
  await new Promise<void>((resolve) => sse.onClose(resolve))
})
