import type { Duration, Timestamp } from "@chronotext/grammar"
import { createNullLogger, type Logger } from "@chronotext/logger"
import type { HumanTimeCodec } from "../ports/codec"
import type { HumanTimeKind, HumanTimeValue } from "../ports/kinds"
import { createDurationAdapter } from "./adapters/duration-adapter"
import { type AbsentPolicy, optionalAdapter } from "./adapters/optional-adapter"
import { createTimestampAdapter } from "./adapters/timestamp-adapter"
import { type HumanTimeOptions, type ResolvedHumanTimeOptions, resolveOptions } from "./options"
import { toHumanTimeCodec } from "./zod/to-human-time-codec"

export type HumanTimeDeps = Readonly<{
  /** Receives debug events for rejected input. Default: a logger that drops everything */
  logger?: Logger
}>

export type OptionalOverrides = Readonly<{
  absent?: AbsentPolicy
}>

export interface HumanTime {
  readonly options: ResolvedHumanTimeOptions
  readonly duration: HumanTimeCodec<Duration>
  readonly timestamp: HumanTimeCodec<Timestamp>

  /** Look a codec up by kind */
  codec<K extends HumanTimeKind>(kind: K): HumanTimeCodec<HumanTimeValue<K>>

  /**
   * Accept null (and, depending on the absent policy, a missing field) in
   * addition to what `codec` accepts.
   */
  optional<T>(codec: HumanTimeCodec<T>, overrides?: OptionalOverrides): HumanTimeCodec<T | null, string | null>
}

/**
 * Build a set of codecs sharing one configuration.
 *
 * @throws BaseError `invalid_options` when `options` fail validation
 *
 * @example
 * ```ts
 * const ht = createHumanTime({ precision: "millis", absent: "null" }, { logger })
 *
 * const Event = z.object({
 *   at: ht.timestamp.schema,
 *   ttl: ht.optional(ht.duration).schema,
 * })
 * ```
 */
export function createHumanTime(options: HumanTimeOptions = {}, deps: HumanTimeDeps = {}): HumanTime {
  const resolved = resolveOptions(options)
  const logger = (deps.logger ?? createNullLogger()).child({ module: "humantime" })

  const codecs: { [K in HumanTimeKind]: HumanTimeCodec<HumanTimeValue<K>> } = {
    duration: toHumanTimeCodec(createDurationAdapter(logger)),
    timestamp: toHumanTimeCodec(createTimestampAdapter(logger, resolved.precision)),
  }

  return {
    options: resolved,
    duration: codecs.duration,
    timestamp: codecs.timestamp,

    codec<K extends HumanTimeKind>(kind: K): HumanTimeCodec<HumanTimeValue<K>> {
      return codecs[kind]
    },

    optional<T>(codec: HumanTimeCodec<T>, overrides: OptionalOverrides = {}): HumanTimeCodec<T | null, string | null> {
      const absent = overrides.absent ?? resolved.absent
      return toHumanTimeCodec(optionalAdapter(codec, { absent, logger }))
    },
  }
}

/** Codecs with the default options: smart precision, absent fields rejected. */
export const humanTime: HumanTime = createHumanTime()
