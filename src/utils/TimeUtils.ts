/**
 * 100-ns intervals between the Gregorian reform (1582-10-15T00:00:00Z)
 * and the Unix epoch.
 */
export const GREGORIAN_OFFSET = 0x01b21dd213814000n

/** 100-ns ticks per millisecond. */
export const TICKS_PER_MS = 10_000n

/** Largest value a 60-bit timestamp can hold. */
export const MAX_TIMESTAMP = (1n << 60n) - 1n

/**
 * Source of UUID timestamps: 100-ns ticks since 1582-10-15.
 */
export type TimeSource = () => bigint

/**
 * Clock provider for time-based UUID generation.
 */
export class TimeUtils {
  /**
   * Current wall-clock time as a 60-bit UUID timestamp.
   * Millisecond resolution; the clock sequence separates values within a tick.
   */
  static now(): bigint {
    return TimeUtils.fromUnixMillis(Date.now())
  }

  static fromUnixMillis(ms: number): bigint {
    if (!Number.isInteger(ms)) {
      throw new RangeError(`TimeUtils: milliseconds must be an integer. Received: ${ms}`)
    }

    return BigInt(ms) * TICKS_PER_MS + GREGORIAN_OFFSET
  }

  static fromDate(date: Date): bigint {
    return TimeUtils.fromUnixMillis(date.getTime())
  }

  /**
   * Converts a UUID timestamp back to a Date, dropping sub-millisecond ticks.
   */
  static toDate(timestamp: bigint): Date {
    return new Date(Number((timestamp - GREGORIAN_OFFSET) / TICKS_PER_MS))
  }
}
