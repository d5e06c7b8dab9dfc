import type { z } from "zod"
import type { Scalar, ValueAdapter } from "./value-adapter"

/**
 * A ValueAdapter that also knows how to sit inside a Zod schema.
 *
 * @example
 * ```ts
 * const Job = z.object({
 *   timeout: humanTime.duration.schema,
 *   startsAt: humanTime.optional(humanTime.timestamp).schema,
 * })
 * ```
 */
export interface HumanTimeCodec<T, S extends Scalar = string> extends ValueAdapter<T, S> {
  readonly schema: z.ZodType<T, unknown>
}
