import { z } from 'zod'

export const CommandStatusEnum = z.enum(['queued', 'running', 'retrying', 'completed', 'failed', 'cancelled'])
export type CommandStatus = z.infer<typeof CommandStatusEnum>

export const TerminalCommandStatusEnum = z.enum(['completed', 'failed', 'cancelled'])
export type TerminalCommandStatus = z.infer<typeof TerminalCommandStatusEnum>

export function isTerminalStatus(status: CommandStatus): status is TerminalCommandStatus {
  return status === 'completed' || status === 'failed' || status === 'cancelled'
}

export const CommandFailureKindEnum = z.enum([
  'timeout',
  'execution_exception',
  'failure_result',
  'cancelled',
  'policy_exhausted'
])
export type CommandFailureKind = z.infer<typeof CommandFailureKindEnum>

export const CommandMetadataSchema = z.record(z.string())
export type CommandMetadata = z.infer<typeof CommandMetadataSchema>

// Snapshot exposed to dashboards and pollers
export const CommandSnapshotSchema = z.object({
  runId: z.string().min(1),
  operationName: z.string().min(1),
  threadScope: z.string().nullable(),
  status: CommandStatusEnum,
  priority: z.number().int(),
  attempt: z.number().int().min(0),
  maxAttempts: z.number().int().min(1),
  timeoutSeconds: z.number().nullable(),
  currentStep: z.number().int().nullable(),
  maxStep: z.number().int().nullable(),
  stepDescription: z.string().nullable(),
  errorMessage: z.string().nullable(),
  failureKind: CommandFailureKindEnum.nullable(),
  resultMessage: z.string().nullable(),
  enqueuedAt: z.string().datetime(),
  startedAt: z.string().datetime().nullable(),
  finishedAt: z.string().datetime().nullable(),
  metadata: CommandMetadataSchema,
  agentName: z.string().nullable(),
  modelName: z.string().nullable()
})
export type CommandSnapshot = Readonly<z.infer<typeof CommandSnapshotSchema>>

export const CommandStatusEventSchema = z.object({
  runId: z.string().min(1),
  operationName: z.string().min(1),
  status: CommandStatusEnum,
  attempt: z.number().int().min(0),
  message: z.string().nullable(),
  failureKind: CommandFailureKindEnum.nullable(),
  timestamp: z.string().datetime()
})
export type CommandStatusEvent = z.infer<typeof CommandStatusEventSchema>

// Step progress reported by running work; carries no status change
export const CommandProgressEventSchema = z.object({
  runId: z.string().min(1),
  operationName: z.string().min(1),
  attempt: z.number().int().min(1),
  currentStep: z.number().int(),
  maxStep: z.number().int(),
  stepDescription: z.string().nullable(),
  timestamp: z.string().datetime()
})
export type CommandProgressEvent = z.infer<typeof CommandProgressEventSchema>

// Frames pushed over the live stream
export const CommandStreamFrameSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('command_list'),
    commands: z.array(CommandSnapshotSchema)
  }),
  z.object({
    type: z.literal('command_status'),
    event: CommandStatusEventSchema
  }),
  z.object({
    type: z.literal('command_progress'),
    event: CommandProgressEventSchema
  })
])
export type CommandStreamFrame = z.infer<typeof CommandStreamFrameSchema>

// Terminal result handed to completion waiters
export type CommandOutcome = {
  runId: string
  operationName: string
  status: TerminalCommandStatus
  attempts: number
  message: string | null
  failureKind: CommandFailureKind | null
}
