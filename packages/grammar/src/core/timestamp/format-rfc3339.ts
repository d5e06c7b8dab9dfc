import type { TimestampPrecision } from "../../ports/precision"
import type { Timestamp } from "./timestamp"

function fraction(nanos: number, precision: TimestampPrecision): string {
  const digits = String(nanos).padStart(9, "0")

  switch (precision) {
    case "seconds":
      return ""
    case "millis":
      return `.${digits.slice(0, 3)}`
    case "micros":
      return `.${digits.slice(0, 6)}`
    case "nanos":
      return `.${digits}`
    case "smart":
      if (nanos === 0) return ""
      if (nanos % 1_000_000 === 0) return `.${digits.slice(0, 3)}`
      if (nanos % 1_000 === 0) return `.${digits.slice(0, 6)}`
      return `.${digits}`
  }
}

/**
 * Render a timestamp as strict RFC3339 in UTC with a trailing `Z`,
 * e.g. `2018-05-11T18:28:30Z`.
 */
export function formatRfc3339(
  timestamp: Timestamp,
  precision: TimestampPrecision = "smart",
): string {
  const seconds = new Date(timestamp.epochSeconds * 1000).toISOString().slice(0, 19)

  return `${seconds}${fraction(timestamp.nanos, precision)}Z`
}
