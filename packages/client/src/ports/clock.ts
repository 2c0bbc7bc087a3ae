import type { Milliseconds } from "./time"

export type TimeSource = {
  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}

export const systemTime: TimeSource = {
  nowMs: () => Date.now(),
}
