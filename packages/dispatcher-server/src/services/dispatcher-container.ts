import { CommandDispatcher } from './command-dispatcher'
import { getCommandTelemetry } from './command-telemetry'
import { getDispatcherConfig, loadPolicyStore } from './config'
import { PolicyResolver } from './policy-resolver'

let cached: CommandDispatcher | null = null

export function getDispatcher(): CommandDispatcher {
  if (cached) return cached
  const config = getDispatcherConfig()
  const dispatcher = new CommandDispatcher({
    resolver: new PolicyResolver(loadPolicyStore(config.policiesPath)),
    sinks: [getCommandTelemetry()],
    maxParallel: config.maxParallel,
    retentionMs: config.retentionMs,
    pruneIntervalMs: config.pruneIntervalMs
  })
  dispatcher.start()
  cached = dispatcher
  return cached
}

export async function shutdownDispatcher(): Promise<void> {
  const dispatcher = cached
  cached = null
  if (dispatcher) {
    await dispatcher.stop()
  }
}
