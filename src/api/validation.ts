import type { z } from 'zod'

/** Zod issues as "path: message" lines for 400 responses. */
export function issueMessages(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
}
