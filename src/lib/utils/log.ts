let debugEnabled = false

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled
}

/** console.log with a [tag] prefix, only when DEBUG is on. */
export function debug(tag: string, message: string, ...args: unknown[]): void {
  if (!debugEnabled) return
  console.log(`[${tag}] ${message}`, ...args)
}
