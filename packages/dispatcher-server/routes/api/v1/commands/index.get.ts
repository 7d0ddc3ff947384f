import { defineEventHandler, setHeader } from 'h3'
import { getDispatcher } from '../../../../src/services/dispatcher-container'

export default defineEventHandler((event) => {
  setHeader(event, 'Cache-Control', 'no-store')
  return { ok: true, commands: getDispatcher().activeCommands() }
})
