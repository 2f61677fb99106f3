import { systemClock } from './clock'

const DEFAULT_MAX_ATTEMPTS = 3
const DEFAULT_INITIAL_MS = 500

export interface RetryOptions {
  maxAttempts?: number
  initialMs?: number
  /** Return false to give up immediately on this error. */
  shouldRetry?: (error: unknown) => boolean
  sleep?: (ms: number) => Promise<void>
  /** Tag used in the log line written before each retry. */
  label?: string
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
  const initialMs = options.initialMs ?? DEFAULT_INITIAL_MS
  const sleep = options.sleep ?? systemClock.sleep
  let lastError: unknown
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn()
    } catch (e) {
      lastError = e
      if (attempt === maxAttempts) throw e
      if (options.shouldRetry && !options.shouldRetry(e)) throw e
      const delay = initialMs * Math.pow(2, attempt - 1)
      console.warn('[retry] %s attempt %d/%d failed, retrying in %dms', options.label ?? 'task', attempt, maxAttempts, delay)
      await sleep(delay)
    }
  }
  throw lastError
}
