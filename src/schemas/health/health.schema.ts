import { z } from 'zod'

export const HealthCheckResponseSchema = z.object({
  status: z.enum(['healthy', 'unhealthy']),
  timestamp: z.string().datetime(),
  checks: z.object({
    database: z.enum(['ok', 'failed']),
  }),
  sync: z.object({
    running: z.boolean(),
    lastStatus: z.enum(['idle', 'running', 'failed']).nullable(),
    lastSyncAttemptAt: z.string().datetime().nullable(),
  }),
})

export type HealthCheckResponse = z.infer<typeof HealthCheckResponseSchema>
