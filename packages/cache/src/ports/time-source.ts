import type { Milliseconds } from "./time"

/**
 * Wall-clock source for creation timestamps and expiry checks.
 */
export interface TimeSource {
  now(): Date
  nowMs(): Milliseconds
}
