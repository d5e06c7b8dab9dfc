import { createError } from "@chronotext/errors"

export const NANOS_PER_SECOND = 1_000_000_000
const NANOS_PER_MILLI = 1_000_000
const BIG_NANOS_PER_SECOND = 1_000_000_000n
const MAX_SECONDS = BigInt(Number.MAX_SAFE_INTEGER)

function invalid(field: string, value: unknown): never {
  throw createError("invalid_duration", `Duration ${field} must be a non-negative safe integer`, {
    context: { [field]: value },
    isOperational: false,
  })
}

function assertWhole(field: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) invalid(field, value)
}

/**
 * Non-negative span of time: whole seconds plus a nanosecond remainder.
 *
 * Instances are immutable and compared by value (`equals`, `compare`).
 * `seconds` is bounded by `Number.MAX_SAFE_INTEGER`, `nanos` by 1e9 - 1.
 */
export class Duration {
  static readonly ZERO = new Duration(0, 0)

  private constructor(
    readonly seconds: number,
    readonly nanos: number,
  ) {}

  /** Nanoseconds of 1e9 or more carry into seconds. */
  static of(seconds: number, nanos = 0): Duration {
    assertWhole("seconds", seconds)
    assertWhole("nanos", nanos)

    const total = seconds + Math.floor(nanos / NANOS_PER_SECOND)
    if (!Number.isSafeInteger(total)) invalid("seconds", total)

    return new Duration(total, nanos % NANOS_PER_SECOND)
  }

  static ofSeconds(seconds: number): Duration {
    return Duration.of(seconds)
  }

  static ofMillis(millis: number): Duration {
    assertWhole("millis", millis)

    return Duration.of(Math.floor(millis / 1000), (millis % 1000) * NANOS_PER_MILLI)
  }

  static ofNanos(nanos: bigint): Duration {
    if (nanos < 0n) invalid("nanos", nanos.toString())

    const seconds = nanos / BIG_NANOS_PER_SECOND
    if (seconds > MAX_SECONDS) invalid("seconds", seconds.toString())

    return new Duration(Number(seconds), Number(nanos % BIG_NANOS_PER_SECOND))
  }

  totalNanos(): bigint {
    return BigInt(this.seconds) * BIG_NANOS_PER_SECOND + BigInt(this.nanos)
  }

  /** Whole milliseconds; the sub-millisecond part is dropped. */
  toMillis(): number {
    return this.seconds * 1000 + Math.floor(this.nanos / NANOS_PER_MILLI)
  }

  equals(other: Duration): boolean {
    return this.seconds === other.seconds && this.nanos === other.nanos
  }

  compare(other: Duration): -1 | 0 | 1 {
    if (this.seconds !== other.seconds) return this.seconds < other.seconds ? -1 : 1
    if (this.nanos !== other.nanos) return this.nanos < other.nanos ? -1 : 1
    return 0
  }
}
