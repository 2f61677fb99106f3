import { readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import type { z } from 'zod'

const __dirname = dirname(fileURLToPath(import.meta.url))
const DATA_DIR = join(__dirname, '../../data')

/** Read and validate a JSON table from src/data. Throws with the file name on bad data. */
export function readDataFile<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const raw: unknown = JSON.parse(readFileSync(join(DATA_DIR, fileName), 'utf8'))
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw new Error(`Invalid data file ${fileName}: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`)
  }
  return parsed.data
}
