import { createError } from "@chronotext/errors"
import { Duration, NANOS_PER_SECOND } from "../duration/duration"

/** 9999-12-31T23:59:59Z, the last second RFC3339 can spell with four year digits. */
export const MAX_EPOCH_SECONDS = 253_402_300_799

function invalid(field: string, value: unknown): never {
  throw createError(
    "invalid_timestamp",
    `Timestamp ${field} must be a whole number between 1970-01-01 and 9999-12-31`,
    { context: { [field]: value }, isOperational: false },
  )
}

/**
 * Point in time: whole seconds since the Unix epoch plus a nanosecond
 * remainder, always UTC.
 *
 * Covers `1970-01-01T00:00:00Z` through `9999-12-31T23:59:59.999999999Z`.
 */
export class Timestamp {
  static readonly UNIX_EPOCH = new Timestamp(0, 0)

  private constructor(
    readonly epochSeconds: number,
    readonly nanos: number,
  ) {}

  static fromEpoch(seconds: number, nanos = 0): Timestamp {
    if (!Number.isSafeInteger(seconds) || seconds < 0) invalid("epochSeconds", seconds)
    if (!Number.isSafeInteger(nanos) || nanos < 0) invalid("nanos", nanos)

    const total = seconds + Math.floor(nanos / NANOS_PER_SECOND)
    if (total > MAX_EPOCH_SECONDS) invalid("epochSeconds", total)

    return new Timestamp(total, nanos % NANOS_PER_SECOND)
  }

  static fromEpochMillis(millis: number): Timestamp {
    if (!Number.isSafeInteger(millis) || millis < 0) invalid("epochMillis", millis)

    return Timestamp.fromEpoch(Math.floor(millis / 1000), (millis % 1000) * 1_000_000)
  }

  static fromDate(date: Date): Timestamp {
    return Timestamp.fromEpochMillis(date.getTime())
  }

  /** Sub-millisecond precision is dropped. */
  toDate(): Date {
    return new Date(this.epochSeconds * 1000 + Math.floor(this.nanos / 1_000_000))
  }

  add(duration: Duration): Timestamp {
    return Timestamp.fromEpoch(this.epochSeconds + duration.seconds, this.nanos + duration.nanos)
  }

  /** Time elapsed from `earlier` to this instant; `earlier` must not be later. */
  since(earlier: Timestamp): Duration {
    return Duration.ofNanos(this.totalNanos() - earlier.totalNanos())
  }

  equals(other: Timestamp): boolean {
    return this.epochSeconds === other.epochSeconds && this.nanos === other.nanos
  }

  compare(other: Timestamp): -1 | 0 | 1 {
    if (this.epochSeconds !== other.epochSeconds) {
      return this.epochSeconds < other.epochSeconds ? -1 : 1
    }
    if (this.nanos !== other.nanos) return this.nanos < other.nanos ? -1 : 1
    return 0
  }

  private totalNanos(): bigint {
    return BigInt(this.epochSeconds) * BigInt(NANOS_PER_SECOND) + BigInt(this.nanos)
  }
}
