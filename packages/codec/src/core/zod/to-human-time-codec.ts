import type { HumanTimeCodec } from "../../ports/codec"
import type { Scalar, ValueAdapter } from "../../ports/value-adapter"
import { toZodSchema } from "./to-zod-schema"

export function toHumanTimeCodec<T, S extends Scalar>(adapter: ValueAdapter<T, S>): HumanTimeCodec<T, S> {
  return { ...adapter, schema: toZodSchema(adapter) }
}
