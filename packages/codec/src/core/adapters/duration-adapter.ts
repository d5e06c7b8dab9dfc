import { Duration, formatDuration, parseDuration } from "@chronotext/grammar"
import type { Logger } from "@chronotext/logger"
import type { ValueAdapter } from "../../ports/value-adapter"
import { createValueAdapter } from "./create-value-adapter"

/** Reads text such as "1h30m" or "15 seconds", writes the canonical form ("1h 30m", "15s"). */
export function createDurationAdapter(logger: Logger): ValueAdapter<Duration> {
  return createValueAdapter<Duration>(
    {
      kind: "duration",
      expecting: "a duration",
      is: (value): value is Duration => value instanceof Duration,
      equals: (a, b) => a.equals(b),
      parse: parseDuration,
      format: formatDuration,
    },
    logger,
  )
}
