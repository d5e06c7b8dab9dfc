export const timestampPrecisions = ["smart", "seconds", "millis", "micros", "nanos"] as const

/**
 * Number of fractional-second digits written by `formatRfc3339`.
 *
 * `smart` writes none for whole seconds, otherwise the shortest of 3, 6 or 9
 * digits that represents the value exactly. The fixed precisions truncate.
 */
export type TimestampPrecision = (typeof timestampPrecisions)[number]
