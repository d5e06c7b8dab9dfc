import type { Duration } from "./duration"
import { DAY_SECONDS, HOUR_SECONDS, MINUTE_SECONDS, MONTH_SECONDS, YEAR_SECONDS } from "./duration-units"

/**
 * Render a duration in its canonical form: every non-zero component from
 * years down to nanoseconds, largest first, separated by one space.
 *
 * @example
 * ```ts
 * formatDuration(Duration.ofSeconds(15))   // "15s"
 * formatDuration(Duration.ofSeconds(9000)) // "2h 30m"
 * formatDuration(Duration.ZERO)            // "0s"
 * ```
 *
 * The output always parses back to the same value with `parseDuration`.
 */
export function formatDuration(duration: Duration): string {
  const { seconds, nanos } = duration
  if (seconds === 0 && nanos === 0) return "0s"

  const years = Math.floor(seconds / YEAR_SECONDS)
  const yearRest = seconds % YEAR_SECONDS
  const months = Math.floor(yearRest / MONTH_SECONDS)
  const monthRest = yearRest % MONTH_SECONDS
  const days = Math.floor(monthRest / DAY_SECONDS)
  const daySeconds = monthRest % DAY_SECONDS

  const parts: string[] = []
  const push = (value: number, unit: string, plural = unit) => {
    if (value > 0) parts.push(`${value}${value === 1 ? unit : plural}`)
  }

  push(years, "year", "years")
  push(months, "month", "months")
  push(days, "day", "days")
  push(Math.floor(daySeconds / HOUR_SECONDS), "h")
  push(Math.floor((daySeconds % HOUR_SECONDS) / MINUTE_SECONDS), "m")
  push(daySeconds % MINUTE_SECONDS, "s")
  push(Math.floor(nanos / 1_000_000), "ms")
  push(Math.floor(nanos / 1_000) % 1_000, "us")
  push(nanos % 1_000, "ns")

  return parts.join(" ")
}
