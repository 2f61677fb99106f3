import { systemClock, type Clock } from './clock'
import { debug } from './log'

/**
 * Minimum spacing between calls to one external source. Callers queue in
 * arrival order; each `wait()` resolves at least `intervalMs` after the
 * previous one resolved. No burst allowance.
 */
export class RateLimiter {
  private lastAt: number | null = null
  private queue: Promise<void> = Promise.resolve()

  constructor(
    readonly intervalMs: number,
    private readonly clock: Clock = systemClock,
    private readonly name = 'source'
  ) {}

  wait(): Promise<void> {
    const turn = this.queue.then(() => this.take())
    this.queue = turn
    return turn
  }

  private async take(): Promise<void> {
    if (this.lastAt !== null) {
      const elapsed = this.clock.now() - this.lastAt
      if (elapsed < this.intervalMs) {
        const waitMs = this.intervalMs - elapsed
        debug('rate-limit', '%s waiting %dms', this.name, waitMs)
        await this.clock.sleep(waitMs)
      }
    }
    this.lastAt = this.clock.now()
  }
}
