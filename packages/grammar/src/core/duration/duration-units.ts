export const MINUTE_SECONDS = 60
export const HOUR_SECONDS = 3_600
export const DAY_SECONDS = 86_400
/** 30.44 days */
export const MONTH_SECONDS = 2_630_016
/** 365.25 days */
export const YEAR_SECONDS = 31_557_600

const NS = 1n
const US = 1_000n
const MS = 1_000_000n
const S = 1_000_000_000n

const unitGroups: ReadonlyArray<readonly [bigint, readonly string[]]> = [
  [NS, ["nanos", "nsec", "ns"]],
  [US, ["usec", "us", "µs"]],
  [MS, ["millis", "msec", "ms"]],
  [S, ["seconds", "second", "secs", "sec", "s"]],
  [BigInt(MINUTE_SECONDS) * S, ["minutes", "minute", "mins", "min", "m"]],
  [BigInt(HOUR_SECONDS) * S, ["hours", "hour", "hrs", "hr", "h"]],
  [BigInt(DAY_SECONDS) * S, ["days", "day", "d"]],
  [BigInt(7 * DAY_SECONDS) * S, ["weeks", "week", "w"]],
  [BigInt(MONTH_SECONDS) * S, ["months", "month", "M"]],
  [BigInt(YEAR_SECONDS) * S, ["years", "year", "y"]],
]

/** Unit spelling (case-sensitive) to its length in nanoseconds. */
export const durationUnits: ReadonlyMap<string, bigint> = new Map(
  unitGroups.flatMap(([nanos, names]) => names.map((name) => [name, nanos] as const)),
)
