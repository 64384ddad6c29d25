import type { Milliseconds } from "../../ports/time"
import type { TimeSource } from "../../ports/time-source"

export class SystemClock implements TimeSource {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }
}

export const systemClock: TimeSource = new SystemClock()
