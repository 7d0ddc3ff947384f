import type { ZodIssue } from 'zod'

export class CommandValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: ZodIssue[] = []
  ) {
    super(message)
    this.name = 'CommandValidationError'
  }
}

export class CommandTimeoutError extends Error {
  constructor(public readonly timeoutSeconds: number) {
    super(`Command timed out after ${timeoutSeconds}s`)
    this.name = 'CommandTimeoutError'
  }
}

export class CommandCancelledError extends Error {
  constructor(message = 'Command cancelled') {
    super(message)
    this.name = 'CommandCancelledError'
  }
}

export class DispatcherStoppedError extends Error {
  constructor() {
    super('Command dispatcher is stopped')
    this.name = 'DispatcherStoppedError'
  }
}

export class CommandNotFoundError extends Error {
  constructor(public readonly runId: string) {
    super(`Unknown command ${runId}`)
    this.name = 'CommandNotFoundError'
  }
}
