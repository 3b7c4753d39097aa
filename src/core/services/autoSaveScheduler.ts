/**
 * AutoSaveScheduler
 *
 * SRP: fires the injected save routine on a fixed interval.
 * DIP: the session decides what "save everything" means.
 */

import { makeLogger } from '@/core/lib/logger'

const logger = makeLogger('auto-save')

export class AutoSaveScheduler {
  private readonly saveAll: () => Promise<void>
  private timer: ReturnType<typeof setInterval> | null = null
  private intervalMs: number
  private active = false
  private running = false

  constructor(opts: { saveAll: () => Promise<void>; intervalMs: number }) {
    this.saveAll = opts.saveAll
    this.intervalMs = opts.intervalMs
  }

  /** Begin saving on the interval; with an interval of 0 nothing fires until rescheduled */
  start() {
    this.active = true
    this.arm()
  }

  stop() {
    this.active = false
    this.disarm()
  }

  reschedule(intervalMs: number) {
    if (intervalMs === this.intervalMs) return
    this.intervalMs = intervalMs
    this.disarm()
    if (this.active) this.arm()
  }

  isRunning(): boolean {
    return this.timer !== null
  }

  private arm() {
    if (this.timer || this.intervalMs <= 0) return
    this.timer = setInterval(() => void this.tick(), this.intervalMs)
  }

  private disarm() {
    if (this.timer) clearInterval(this.timer)
    this.timer = null
  }

  private async tick() {
    // A slow save must not overlap the next one
    if (this.running) return

    this.running = true
    try {
      await this.saveAll()
    } catch (err) {
      logger.warn('Auto-save failed', err)
    } finally {
      this.running = false
    }
  }
}
