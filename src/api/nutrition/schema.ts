import { z } from 'zod'

export const MAX_BATCH_NAMES = 25

const name = z.string().trim().min(1, 'name must not be empty').max(200)

export const lookupQuerySchema = z.object({ name })

export const batchLookupSchema = z.object({
  names: z.array(name).min(1).max(MAX_BATCH_NAMES),
})

export const termsQuerySchema = z.object({ text: name })

export type BatchLookupBody = z.infer<typeof batchLookupSchema>
