import { setHeader, type H3Event } from 'h3'
import { getLogger } from '../services/logger'

/**
 * Event-stream writer for the command feed. Frames carry the event name, a per-stream
 * id and JSON data tagged with the caller's correlation id. Writes wait for `drain`
 * when the socket buffer is full.
 */
export type SseWriter = {
  sendNamed: (type: string, data: Record<string, unknown>) => Promise<void>
  close: () => void
  onClose: (listener: () => void) => void
  aborted: () => boolean
}

export function createSse(
  event: H3Event,
  opts: { correlationId?: string; heartbeatMs?: number } = {}
): SseWriter {
  const res = event.node.res
  const req = event.node.req
  const heartbeatMs = opts.heartbeatMs ?? 15000
  const correlationId = opts.correlationId
  const closeListeners: Array<() => void> = []
  let id = 1
  let closed = false

  // keep reverse proxies from buffering or compressing the feed
  setHeader(event, 'Content-Type', 'text/event-stream; charset=utf-8')
  setHeader(event, 'Cache-Control', 'no-cache, no-transform')
  setHeader(event, 'Connection', 'keep-alive')
  setHeader(event, 'X-Accel-Buffering', 'no')
  setHeader(event, 'Content-Encoding', 'identity')
  res.flushHeaders()

  res.write(':\n\n')

  const writeRaw = (chunk: string) =>
    new Promise<void>((resolve) => {
      if (closed || res.writableEnded || res.destroyed) {
        closed = true
        return resolve()
      }

      const ok = res.write(chunk)
      if (ok) return resolve()

      const start = Date.now()

      const cleanup = () => {
        res.off('drain', handleDrain)
        req.off('close', handleTerminate)
      }

      const handleDrain = () => {
        cleanup()
        getLogger().info('sse_drain', { correlationId, waitMs: Date.now() - start })
        resolve()
      }

      const handleTerminate = () => {
        cleanup()
        resolve()
      }

      getLogger().warn('sse_backpressure', { correlationId, bytes: Buffer.byteLength(chunk) })

      res.once('drain', handleDrain)
      req.once('close', handleTerminate)
    })

  const sendNamed = async (type: string, data: Record<string, unknown>) => {
    if (closed) return
    const payload = JSON.stringify(correlationId ? { correlationId, ...data } : data)
    const frame = `event: ${type}\nid: ${id}\ndata: ${payload}\n\n`
    id++
    await writeRaw(frame)
  }

  const heartbeat = setInterval(() => {
    void sendNamed('heartbeat', { ts: Date.now() })
  }, heartbeatMs)

  const close = () => {
    if (closed) return
    closed = true
    clearInterval(heartbeat)
    for (const listener of closeListeners.splice(0)) {
      listener()
    }
    if (!res.writableEnded) {
      res.end()
    }
  }

  req.on('close', close)

  return {
    sendNamed,
    close,
    onClose: (listener) => {
      if (closed) {
        listener()
        return
      }
      closeListeners.push(listener)
    },
    aborted: () => closed
  }
}
