import {
  formatRfc3339,
  parseRfc3339Weak,
  Timestamp,
  type TimestampPrecision,
} from "@chronotext/grammar"
import type { Logger } from "@chronotext/logger"
import type { ValueAdapter } from "../../ports/value-adapter"
import { createValueAdapter } from "./create-value-adapter"

/**
 * Reads RFC3339 leniently (space separator, missing "Z"), always writes the
 * strict form at the configured precision.
 */
export function createTimestampAdapter(
  logger: Logger,
  precision: TimestampPrecision = "smart",
): ValueAdapter<Timestamp> {
  return createValueAdapter<Timestamp>(
    {
      kind: "timestamp",
      expecting: "a timestamp",
      is: (value): value is Timestamp => value instanceof Timestamp,
      equals: (a, b) => a.equals(b),
      parse: parseRfc3339Weak,
      format: (value) => formatRfc3339(value, precision),
    },
    logger,
  )
}
