export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  // System Config
  port: number
  dbPath: string
  logLevel: LogLevel
  closeGraceDelay: number

  // Sync Config
  syncIntervalMinutes: number
  fullSyncIntervalHours: number
  feedConcurrency: number
  progressBatchSize: number
  pendingActionRetentionDays: number

  // Remote Config
  feedTimeoutMs: number
  requestTimeoutMs: number
  deviceId: string
}
