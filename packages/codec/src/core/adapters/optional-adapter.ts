import { createNullLogger, type Logger } from "@chronotext/logger"
import type { DecodeOutcome, ValueAdapter } from "../../ports/value-adapter"
import { InvalidValueError } from "../errors/invalid-value-error"

export const absentPolicies = ["null", "reject"] as const

/**
 * What an absent field (`undefined`) decodes to.
 *
 * - `"null"`: same as an explicit null
 * - `"reject"`: a `missing` InvalidValueError
 */
export type AbsentPolicy = (typeof absentPolicies)[number]

export type OptionalAdapterOptions = Readonly<{
  absent: AbsentPolicy
  /** Receives the debug event for a rejected absent value */
  logger?: Logger
}>

/**
 * Lift an adapter over `T | null`.
 *
 * Null decodes to null and encodes to null, everything else is the inner
 * adapter's business. A rejected absent value is logged at debug like the
 * inner adapter's rejections.
 */
export function optionalAdapter<T>(
  inner: ValueAdapter<T>,
  options: OptionalAdapterOptions,
): ValueAdapter<T | null, string | null> {
  const expecting = `${inner.expecting} or null`
  const log = (options.logger ?? createNullLogger()).child({ kind: inner.kind })

  return {
    kind: inner.kind,
    expecting,

    is: (value: unknown): value is T | null => value === null || inner.is(value),

    equals: (a: T | null, b: T | null): boolean => {
      if (a === null || b === null) return a === b
      return inner.equals(a, b)
    },

    decode(input: unknown): DecodeOutcome<T | null> {
      if (input === null) return { kind: "decoded", value: null }

      if (input === undefined) {
        if (options.absent === "null") return { kind: "decoded", value: null }

        const error = new InvalidValueError({ expected: expecting, reason: "missing" })
        log.debug("rejected input", { operation: "decode", reason: error.reason, err: error })

        return { kind: "invalid", error }
      }

      return inner.decode(input)
    },

    encode: (value: T | null): string | null => (value === null ? null : inner.encode(value)),
  }
}
