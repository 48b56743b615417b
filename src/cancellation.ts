// cancellation.ts
// Cancellation is cooperative and expressed with AbortSignal, the same way tasks
// observe `scope.signal`.

export interface Scope {
  /** Aborted when the task owning this scope is cancelled or superseded. */
  readonly signal: AbortSignal
}

export function abortError(message = 'Aborted'): DOMException {
  return new DOMException(message, 'AbortError')
}

export function isAbortError(error: unknown): boolean {
  return error instanceof DOMException && error.name === 'AbortError'
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw abortError()
}

/**
 * Registers `callback` for the signal's abort event and returns the function
 * that unregisters it. Runs the callback immediately for an aborted signal.
 */
export function onAbort(signal: AbortSignal | undefined, callback: () => void): () => void {
  if (!signal) return () => {}
  if (signal.aborted) {
    callback()
    return () => {}
  }
  signal.addEventListener('abort', callback, { once: true })
  return () => signal.removeEventListener('abort', callback)
}

/**
 * The registry entry for one in-flight operation.
 */
export class TaskHandle {
  private readonly controller = new AbortController()
  private finished = false

  constructor(readonly label: string) {}

  get signal(): AbortSignal {
    return this.controller.signal
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted
  }

  get isFinished(): boolean {
    return this.finished
  }

  cancel(): void {
    if (this.controller.signal.aborted) return
    this.controller.abort(abortError(`Task '${this.label}' cancelled`))
  }

  markFinished(): void {
    this.finished = true
  }
}
