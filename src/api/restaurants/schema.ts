import { z } from 'zod'

export const nearbyQuerySchema = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lon: z.coerce.number().min(-180).max(180),
  radius: z.coerce.number().positive().max(50).optional(),
})

export const codeQuerySchema = z.object({
  name: z.string().trim().min(1),
})
