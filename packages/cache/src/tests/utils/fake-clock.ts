import type { Milliseconds, Seconds } from "../../ports/time"
import type { TimeSource } from "../../ports/time-source"

export class FakeClock implements TimeSource {
  private time: Milliseconds

  constructor(start: Milliseconds = Date.UTC(2024, 2, 1, 8, 0, 0)) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  advanceSeconds(seconds: Seconds): void {
    this.advance(seconds * 1000)
  }
}
