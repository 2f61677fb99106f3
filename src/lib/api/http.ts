import type { z } from 'zod'
import { SourceError } from '../lookup/errors'

/**
 * fetch + status mapping + response validation for source clients.
 * 429 is `rate_limited`; every other failure is `transient`.
 */
export async function fetchJson<T>(
  sourceId: string,
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  init?: RequestInit
): Promise<T> {
  let res: Response
  try {
    res = await fetch(url, init)
  } catch (e) {
    throw new SourceError('transient', sourceId, `network error: ${e instanceof Error ? e.message : String(e)}`)
  }
  if (res.status === 429) throw new SourceError('rate_limited', sourceId, 'HTTP 429')
  if (!res.ok) throw new SourceError('transient', sourceId, `HTTP ${res.status}`)

  let body: unknown
  try {
    body = await res.json()
  } catch (e) {
    throw new SourceError('transient', sourceId, `invalid JSON: ${e instanceof Error ? e.message : String(e)}`)
  }
  const parsed = schema.safeParse(body)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new SourceError('transient', sourceId, `unexpected response: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`)
  }
  return parsed.data
}

/** Finite, non-negative number or undefined. */
export function nutrientValue(value: number | null | undefined, scale = 1): number | undefined {
  if (value === null || value === undefined || !Number.isFinite(value)) return undefined
  return Math.max(0, value * scale)
}
