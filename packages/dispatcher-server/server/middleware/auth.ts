import { createError, defineEventHandler, getHeader } from 'h3'
import { getDispatcherConfig } from '../../src/services/config'

export default defineEventHandler((event) => {
  if (!event.path?.startsWith('/api/')) return
  // Always let CORS preflight pass
  if (event.method === 'OPTIONS') return
  const expected = getDispatcherConfig().apiKey
  if (!expected) return // Do not enforce in local dev unless API_KEY is set
  const header = getHeader(event, 'authorization') || ''
  if (!header.startsWith('Bearer ')) {
    throw createError({ statusCode: 401, statusMessage: 'Missing bearer token', data: { code: 'unauthorized' } })
  }
  const token = header.slice('Bearer '.length)
  if (token !== expected) {
    throw createError({ statusCode: 403, statusMessage: 'Invalid API key', data: { code: 'forbidden' } })
  }
})
