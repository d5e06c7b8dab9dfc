import { z } from "zod"
import type { Scalar, ValueAdapter } from "../ports/value-adapter"
import { InvalidValueError } from "./errors/invalid-value-error"

/**
 * Decode a single scalar, throwing InvalidValueError on rejection.
 *
 * @example
 * ```ts
 * const timeout = deserialize(humanTime.duration, process.env.TIMEOUT)
 * ```
 */
export function deserialize<T, S extends Scalar>(codec: ValueAdapter<T, S>, input: unknown): T {
  const outcome = codec.decode(input)
  if (outcome.kind === "invalid") throw outcome.error

  return outcome.value
}

export function serialize<T, S extends Scalar>(codec: ValueAdapter<T, S>, value: T): S {
  return codec.encode(value)
}

/**
 * Parse a whole document with a host schema.
 *
 * The first issue is rethrown as an InvalidValueError whose `path` points at
 * the offending field.
 */
export function decodeDocument<Schema extends z.ZodType>(schema: Schema, input: unknown): z.output<Schema> {
  const result = schema.safeParse(input)
  if (!result.success) throw InvalidValueError.fromZodError(result.error)

  return result.data
}

/**
 * Encode a document back to its serializable shape (time values become text).
 */
export function encodeDocument<Schema extends z.ZodType>(
  schema: Schema,
  value: z.output<Schema>,
): z.input<Schema> {
  const result = z.safeEncode(schema, value)
  if (!result.success) throw InvalidValueError.fromZodError(result.error)

  return result.data
}
