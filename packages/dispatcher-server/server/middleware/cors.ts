import { defineEventHandler, getHeader, sendNoContent, setHeader } from 'h3'
import { getDispatcherConfig, type DispatcherConfig } from '../../src/services/config'

const DEV_ORIGINS = ['http://localhost:3000', 'http://localhost:5173', 'http://127.0.0.1:5173']

/** Origin to echo back for a dashboard request, or null when it gets no CORS headers. */
export function allowedOrigin(origin: string | undefined, config: Pick<DispatcherConfig, 'corsAllowOrigins' | 'nodeEnv'>) {
  if (!origin) return null
  const allowList = config.corsAllowOrigins.length > 0
    ? config.corsAllowOrigins
    : config.nodeEnv === 'production' ? [] : DEV_ORIGINS
  return allowList.includes('*') || allowList.includes(origin) ? origin : null
}

export default defineEventHandler((event) => {
  if (!(event.path || '').startsWith('/api/')) return

  const origin = allowedOrigin(getHeader(event, 'origin'), getDispatcherConfig())
  if (!origin) return

  setHeader(event, 'Vary', 'Origin')
  setHeader(event, 'Access-Control-Allow-Origin', origin)
  setHeader(event, 'Access-Control-Allow-Methods', 'GET,POST,OPTIONS')
  setHeader(event, 'Access-Control-Allow-Headers', 'content-type,authorization,x-correlation-id')
  setHeader(event, 'Access-Control-Expose-Headers', 'content-type,x-correlation-id')
  setHeader(event, 'Access-Control-Max-Age', 600)

  if (event.method === 'OPTIONS') {
    return sendNoContent(event, 204)
  }
})
