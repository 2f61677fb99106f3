import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import type { CacheRecord } from './resultCache'

const nutrientRange = z.object({
  min: z.number().nonnegative(),
  max: z.number().nonnegative(),
  unit: z.enum(['kcal', 'g', 'mg']),
})

export const scoredResultSchema = z.object({
  originalInput: z.string(),
  cleanedQuery: z.string(),
  matchedKey: z.string(),
  matchedName: z.string(),
  sourceId: z.string(),
  nutrition: z.object({
    nutrients: z.object({
      calories: nutrientRange.optional(),
      protein: nutrientRange.optional(),
      carbs: nutrientRange.optional(),
      fat: nutrientRange.optional(),
      sugar: nutrientRange.optional(),
      fiber: nutrientRange.optional(),
      sodium: nutrientRange.optional(),
    }),
    completenessScore: z.number().min(0).max(1),
    matchCount: z.number().int().nonnegative(),
  }),
  matchScore: z.number().min(0).max(1),
  confidence: z.number().min(0).max(1),
  isAvailable: z.boolean(),
  timestamp: z.number(),
})

/**
 * Read a cache snapshot written by `saveSnapshot`. A missing file is an empty
 * snapshot; a malformed one is an error.
 */
export async function loadSnapshot<T>(
  path: string,
  valueSchema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<CacheRecord<T>[]> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (e) {
    if (isMissingFile(e)) return []
    throw e
  }
  const records = z
    .array(z.object({ key: z.string().min(1), value: valueSchema, timestamp: z.number() }))
    .safeParse(JSON.parse(text))
  if (!records.success) throw new Error(`Cache snapshot ${path} is invalid: ${records.error.message}`)
  return records.data
}

/** Write to a temp file and rename over the target so readers never see half a file. */
export async function saveSnapshot<T>(path: string, records: CacheRecord<T>[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  const tmp = `${path}.tmp`
  await writeFile(tmp, JSON.stringify(records), 'utf8')
  await rename(tmp, path)
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT'
}
