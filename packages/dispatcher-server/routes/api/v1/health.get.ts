import { defineEventHandler } from 'h3'
import { getDispatcherConfig } from '../../../src/services/config'
import { getDispatcher } from '../../../src/services/dispatcher-container'
import { getLogger } from '../../../src/services/logger'

export default defineEventHandler(() => {
  const stats = getDispatcher().stats()
  const status = stats.state === 'running' ? 'healthy' : 'degraded'

  getLogger().info('health_probe', { status, queued: stats.queued, running: stats.running })

  return {
    status,
    timestamp: new Date().toISOString(),
    uptimeSeconds: Math.round(process.uptime()),
    dispatcher: stats,
    env: {
      nodeEnv: getDispatcherConfig().nodeEnv
    }
  }
})
