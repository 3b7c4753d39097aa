/**
 * Trailing-edge debounce timer.
 *
 * Each `schedule()` cancels the previous pending callback, so only the last
 * pause fires. Cancellation is synchronous.
 *
 * @example
 * ```ts
 * const debouncer = new Debouncer(1500)
 * debouncer.schedule(() => requestSuggestion())
 * debouncer.cancel() // nothing fires
 * ```
 */
export class Debouncer {
  private timer: ReturnType<typeof setTimeout> | null = null
  private generation = 0

  constructor(private delayMs: number) {}

  setDelay(delayMs: number): void {
    this.delayMs = Math.max(0, delayMs)
  }

  /**
   * (Re)start the timer. The callback receives the generation token it was
   * scheduled under, so a late callback can be recognised as superseded.
   */
  schedule(callback: (token: number) => void): number {
    this.cancel()
    const token = ++this.generation
    this.timer = setTimeout(() => {
      this.timer = null
      callback(token)
    }, this.delayMs)
    return token
  }

  cancel(): void {
    if (this.timer) clearTimeout(this.timer)
    this.timer = null
  }
}
