import { z } from 'zod'

export const LoginBodySchema = z.object({
  protocol: z.enum(['gpodder', 'podcast-service']),
  serverUrl: z.string().url(),
  username: z.string().min(1),
  password: z.string().min(1),
})

export const SessionResponseSchema = z.object({
  serverUrl: z.string().nullable(),
  protocol: z.enum(['gpodder', 'podcast-service']).nullable(),
  username: z.string().nullable(),
  isAuthenticated: z.boolean(),
})

export type LoginBody = z.infer<typeof LoginBodySchema>
export type SessionResponse = z.infer<typeof SessionResponseSchema>
