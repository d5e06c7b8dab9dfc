export { Duration } from "./core/duration/duration"
export { durationUnits } from "./core/duration/duration-units"
export { formatDuration } from "./core/duration/format-duration"
export { parseDuration } from "./core/duration/parse-duration"
export {
  DurationError,
  type DurationErrorCode,
  type GrammarError,
  isGrammarError,
  TimestampError,
  type TimestampErrorCode,
} from "./core/grammar-error"
export { formatRfc3339 } from "./core/timestamp/format-rfc3339"
export { parseRfc3339, parseRfc3339Weak } from "./core/timestamp/parse-rfc3339"
export { MAX_EPOCH_SECONDS, Timestamp } from "./core/timestamp/timestamp"
export { type TimestampPrecision, timestampPrecisions } from "./ports/precision"
