import { z } from "zod"
import type { Scalar, ValueAdapter } from "../../ports/value-adapter"

/**
 * Build a bidirectional Zod schema around an adapter.
 *
 * Decoding (`parse`, `safeParse`) runs `adapter.decode`. A rejection becomes
 * a single custom issue whose `params` keep the reason, the expectation and
 * the received input, which is what `InvalidValueError.fromZodError` reads
 * back. Encoding (`z.encode`, `z.safeEncode`) checks the value with
 * `adapter.is` and writes it with `adapter.encode`.
 *
 * The input side is optional so that an absent object key still reaches the
 * adapter, which decides between `missing` and null.
 */
export function toZodSchema<T, S extends Scalar>(adapter: ValueAdapter<T, S>): z.ZodType<T, unknown> {
  return z.codec(
    z.unknown().optional(),
    z.custom<T>((value) => adapter.is(value), { error: `expected ${adapter.expecting}` }),
    {
      decode: (input, ctx) => {
        const outcome = adapter.decode(input)
        if (outcome.kind === "decoded") return outcome.value

        const { error } = outcome
        ctx.issues.push({
          code: "custom",
          input,
          message: error.message,
          params: { reason: error.reason, expected: error.expected, received: error.received },
        })

        return z.NEVER
      },
      encode: (value) => adapter.encode(value),
    },
  )
}
