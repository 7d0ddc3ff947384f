import { defineNitroPlugin } from 'nitropack/runtime'
import { getDispatcherConfig, loadEnvFiles } from '../../src/services/config'
import { getDispatcher, shutdownDispatcher } from '../../src/services/dispatcher-container'

// Load package-local env first so repo-level overrides can win.
loadEnvFiles()

export default defineNitroPlugin((nitroApp) => {
  const config = getDispatcherConfig()
  // Throwing during plugin init prevents the server from starting
  if (config.nodeEnv === 'production' && !config.apiKey) {
    throw new Error('[dispatcher-server] Missing required environment variables in production: API_KEY')
  }

  getDispatcher()
  nitroApp.hooks.hook('close', async () => {
    await shutdownDispatcher()
  })
})
