/** Failures a source client can signal by throwing. */
export type SourceFailureKind = 'transient' | 'rate_limited'

export type LookupFailureKind = 'declined' | SourceFailureKind | 'invalid_input'

/** Why a lookup did not produce a result at one source. Logged, never returned to callers. */
export interface LookupFailure {
  kind: LookupFailureKind
  input: string
  sourceId?: string
  detail?: string
}

export class SourceError extends Error {
  constructor(
    readonly kind: SourceFailureKind,
    readonly sourceId: string,
    message: string
  ) {
    super(message)
    this.name = 'SourceError'
  }
}

/** Anything a source throws that is not a SourceError is a transient failure. */
export function toLookupFailure(error: unknown, sourceId: string, input: string): LookupFailure {
  if (error instanceof SourceError) return { kind: error.kind, sourceId, input, detail: error.message }
  return { kind: 'transient', sourceId, input, detail: error instanceof Error ? error.message : String(error) }
}

export function logFailure(failure: LookupFailure): void {
  const where = failure.sourceId ?? '-'
  const detail = failure.detail ?? ''
  switch (failure.kind) {
    case 'declined':
      console.log('[chain] declined source=%s input=%j %s', where, failure.input, detail)
      break
    case 'invalid_input':
      console.warn('[chain] invalid input=%j %s', failure.input, detail)
      break
    case 'rate_limited':
      console.warn('[chain] rate limited source=%s input=%j %s', where, failure.input, detail)
      break
    case 'transient':
      console.warn('[chain] source failed source=%s input=%j %s', where, failure.input, detail)
      break
  }
}
