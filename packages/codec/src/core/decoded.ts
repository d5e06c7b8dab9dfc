import { createError } from "@chronotext/errors"
import type { z } from "zod"
import type { HumanTimeCodec } from "../ports/codec"
import type { Scalar } from "../ports/value-adapter"

/**
 * A value that is known to have come out of a time codec.
 *
 * Instances are only created by the schema returned from `Decoded.schema`,
 * so holding one means the text was parsed successfully. Read it with
 * `value`, or take it out with `intoInner()`, after which the wrapper is
 * spent and further access throws `decoded_consumed`.
 *
 * @example
 * ```ts
 * const Config = z.object({ timeout: Decoded.schema(humanTime.duration) })
 * const { timeout } = decodeDocument(Config, { timeout: "30s" })
 * const duration = timeout.intoInner()
 * ```
 */
export class Decoded<T> {
  private consumed = false

  private constructor(
    private readonly payload: T,
    private readonly equality: (a: T, b: T) => boolean,
  ) {}

  static schema<T, S extends Scalar>(codec: HumanTimeCodec<T, S>): z.ZodType<Decoded<T>, unknown> {
    return codec.schema.transform((value) => new Decoded(value, codec.equals))
  }

  get value(): T {
    this.assertUnconsumed()
    return this.payload
  }

  intoInner(): T {
    this.assertUnconsumed()
    this.consumed = true
    return this.payload
  }

  equals(other: Decoded<T>): boolean {
    return this.equality(this.value, other.value)
  }

  private assertUnconsumed(): void {
    if (this.consumed) {
      throw createError("decoded_consumed", "Decoded value was already taken with intoInner()", {
        isOperational: false,
      })
    }
  }
}
