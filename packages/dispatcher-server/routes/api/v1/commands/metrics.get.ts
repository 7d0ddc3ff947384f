import { defineEventHandler, setHeader } from 'h3'
import { getCommandTelemetry } from '../../../../src/services/command-telemetry'
import { getDispatcher } from '../../../../src/services/dispatcher-container'

export default defineEventHandler((event) => {
  setHeader(event, 'Cache-Control', 'no-store')
  return {
    ok: true,
    dispatcher: getDispatcher().stats(),
    metrics: getCommandTelemetry().getMetricsSnapshot()
  }
})
