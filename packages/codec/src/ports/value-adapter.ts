import type { InvalidValueError } from "../core/errors/invalid-value-error"
import type { HumanTimeKind } from "./kinds"

/** The only shapes a value ever takes on the wire. */
export type Scalar = string | null

export type DecodeSuccess<T> = {
  readonly kind: "decoded"
  readonly value: T
}

export type DecodeFailure = {
  readonly kind: "invalid"
  readonly error: InvalidValueError
}

/** Result of a single decode; never partial. */
export type DecodeOutcome<T> = DecodeSuccess<T> | DecodeFailure

/**
 * ValueAdapter converts one native value type to and from its textual scalar.
 *
 * @remarks
 * Adapters are pure: `decode` inspects only its input and reports failure as
 * a `DecodeFailure` outcome instead of throwing, `encode` is total over `T`.
 * Everything else in the codec (the optional lifting, the `Decoded` wrapper,
 * the hooks, the Zod schema) goes through an adapter so the paths cannot
 * drift apart.
 */
export interface ValueAdapter<T, S extends Scalar = string> {
  readonly kind: HumanTimeKind

  /** What the adapter accepts, phrased for diagnostics: "a duration". */
  readonly expecting: string

  /** Runtime check that `value` is a `T` (used before encoding). */
  is(value: unknown): value is T

  equals(a: T, b: T): boolean

  decode(input: unknown): DecodeOutcome<T>

  encode(value: T): S
}
