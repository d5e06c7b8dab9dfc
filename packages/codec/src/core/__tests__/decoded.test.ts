import { Duration, Timestamp } from "@chronotext/grammar"
import { z } from "zod"
import { humanTime } from "../create-human-time"
import { Decoded } from "../decoded"
import { deserialize } from "../hooks"

describe("Decoded", () => {
  const DurationField = Decoded.schema(humanTime.duration)

  it("wraps a successfully decoded value", () => {
    const decoded = DurationField.parse("15s")

    expect(decoded).toBeInstanceOf(Decoded)
    expect(decoded.value).toEqual(Duration.ofSeconds(15))
  })

  it("can be read repeatedly until taken", () => {
    const decoded = DurationField.parse("2m")

    expect(decoded.value).toEqual(Duration.ofSeconds(120))
    expect(decoded.value).toEqual(Duration.ofSeconds(120))
    expect(decoded.intoInner()).toEqual(Duration.ofSeconds(120))
  })

  it("is spent after intoInner", () => {
    const decoded = DurationField.parse("2m")
    decoded.intoInner()

    const consumed = expect.objectContaining({ code: "decoded_consumed", isOperational: false })
    expect(() => decoded.value).toThrow(consumed)
    expect(() => decoded.intoInner()).toThrow(consumed)
  })

  it("compares by the wrapped value", () => {
    expect(DurationField.parse("90s").equals(DurationField.parse("1m 30s"))).toBe(true)
    expect(DurationField.parse("90s").equals(DurationField.parse("1m"))).toBe(false)
  })

  it("is never built from rejected input", () => {
    expect(DurationField.safeParse("soon").success).toBe(false)
  })

  it("yields the same value as deserialize", () => {
    const TimestampField = Decoded.schema(humanTime.timestamp)
    const text = "2018-05-11T18:28:30.25Z"

    expect(TimestampField.parse(text).intoInner()).toEqual(deserialize(humanTime.timestamp, text))
    expect(deserialize(humanTime.timestamp, text)).toEqual(Timestamp.fromEpoch(1_526_063_310, 250_000_000))
  })

  it("wraps optional codecs", () => {
    const Config = z.object({
      timeout: Decoded.schema(humanTime.optional(humanTime.duration, { absent: "null" })),
    })

    expect(Config.parse({}).timeout.intoInner()).toBeNull()
    expect(Config.parse({ timeout: "5s" }).timeout.intoInner()).toEqual(Duration.ofSeconds(5))
  })

  it("rejects an absent optional field under the default absent policy", () => {
    const Config = z.object({ timeout: Decoded.schema(humanTime.optional(humanTime.duration)) })

    const result = Config.safeParse({})

    expect(result.success).toBe(false)
    expect(result.error?.issues[0]).toMatchObject({ path: ["timeout"], params: { reason: "missing" } })
    expect(Config.parse({ timeout: null }).timeout.intoInner()).toBeNull()
  })
})
