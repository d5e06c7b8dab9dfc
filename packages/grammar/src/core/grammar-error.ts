import { BaseError, type ErrorContext } from "@chronotext/errors"

export type DurationErrorCode =
  | "empty"
  | "number_expected"
  | "invalid_character"
  | "unknown_unit"
  | "number_overflow"

export type TimestampErrorCode = "invalid_format" | "invalid_digit" | "out_of_range"

/** Raised by `parseDuration`. Context always carries the rejected `input`. */
export class DurationError extends BaseError<DurationErrorCode> {
  constructor(code: DurationErrorCode, message: string, context: ErrorContext) {
    super(message, { code, context })
  }
}

/** Raised by the RFC3339 parsers. Context always carries the rejected `input`. */
export class TimestampError extends BaseError<TimestampErrorCode> {
  constructor(code: TimestampErrorCode, message: string, context: ErrorContext) {
    super(message, { code, context })
  }
}

export type GrammarError = DurationError | TimestampError

export function isGrammarError(err: unknown): err is GrammarError {
  return err instanceof DurationError || err instanceof TimestampError
}
