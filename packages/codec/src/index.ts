export { type AbsentPolicy, absentPolicies, optionalAdapter } from "./core/adapters/optional-adapter"
export {
  createHumanTime,
  type HumanTime,
  type HumanTimeDeps,
  humanTime,
  type OptionalOverrides,
} from "./core/create-human-time"
export { Decoded } from "./core/decoded"
export {
  describeReceived,
  formatPath,
  InvalidValueError,
  type InvalidValueDetails,
  type InvalidValueReason,
  invalidValueReasons,
  type SchemaIssue,
} from "./core/errors/invalid-value-error"
export { decodeDocument, deserialize, encodeDocument, serialize } from "./core/hooks"
export {
  type HumanTimeOptions,
  humanTimeOptionsSchema,
  type ResolvedHumanTimeOptions,
} from "./core/options"
export type { HumanTimeCodec } from "./ports/codec"
export { type HumanTimeKind, humanTimeKinds, type HumanTimeValue, type HumanTimeValueMap } from "./ports/kinds"
export type {
  DecodeFailure,
  DecodeOutcome,
  DecodeSuccess,
  Scalar,
  ValueAdapter,
} from "./ports/value-adapter"
export {
  Duration,
  formatDuration,
  formatRfc3339,
  parseDuration,
  parseRfc3339,
  parseRfc3339Weak,
  Timestamp,
  type TimestampPrecision,
} from "@chronotext/grammar"
