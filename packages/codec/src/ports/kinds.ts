import type { Duration, Timestamp } from "@chronotext/grammar"

/** The closed set of value kinds. Adapters for them are only built inside this package. */
export const humanTimeKinds = ["duration", "timestamp"] as const

export type HumanTimeKind = (typeof humanTimeKinds)[number]

export type HumanTimeValueMap = {
  duration: Duration
  timestamp: Timestamp
}

export type HumanTimeValue<K extends HumanTimeKind> = HumanTimeValueMap[K]
