import { TimestampError } from "../../grammar-error"
import { parseRfc3339, parseRfc3339Weak } from "../parse-rfc3339"
import { Timestamp } from "../timestamp"

function rejection(parse: (input: string) => Timestamp, input: string): TimestampError {
  try {
    parse(input)
  } catch (err) {
    if (err instanceof TimestampError) return err
    throw err
  }
  throw new Error(`expected "${input}" to be rejected`)
}

const MAY_11_2018 = Timestamp.fromEpoch(1_526_063_310)

describe("parseRfc3339 (strict)", () => {
  it("parses a UTC timestamp", () => {
    expect(parseRfc3339("2018-05-11T18:28:30Z")).toEqual(MAY_11_2018)
  })

  it("parses fractions of one to nine digits", () => {
    expect(parseRfc3339("2018-05-11T18:28:30.5Z").nanos).toBe(500_000_000)
    expect(parseRfc3339("2018-05-11T18:28:30.000001Z").nanos).toBe(1_000)
    expect(parseRfc3339("2018-05-11T18:28:30.123456789Z").nanos).toBe(123_456_789)
  })

  it("requires the T separator", () => {
    expect(rejection(parseRfc3339, "2018-05-11 18:28:30Z").code).toBe("invalid_format")
  })

  it("requires the Z suffix", () => {
    const err = rejection(parseRfc3339, "2018-05-11T18:28:30")

    expect(err.code).toBe("invalid_format")
    expect(err.message).toBe('expected "Z"')
    expect(err.context).toEqual({ input: "2018-05-11T18:28:30", mode: "strict" })
  })

  it("rejects numeric offsets", () => {
    expect(rejection(parseRfc3339, "2018-05-11T18:28:30+02:00").code).toBe("invalid_format")
  })
})

describe("parseRfc3339Weak", () => {
  it.each([
    "2018-05-11 18:28:30",
    "2018-05-11T18:28:30",
    "2018-05-11t18:28:30",
    "2018-05-11 18:28:30Z",
    "2018-05-11T18:28:30Z",
  ])("reads %j as 2018-05-11T18:28:30Z", (input) => {
    expect(parseRfc3339Weak(input)).toEqual(MAY_11_2018)
  })

  it("equals the strict reading of the canonical form", () => {
    expect(parseRfc3339Weak("2018-05-11 18:28:30")).toEqual(parseRfc3339("2018-05-11T18:28:30Z"))
  })

  it("keeps the fraction without a suffix", () => {
    expect(parseRfc3339Weak("2018-05-11 18:28:30.25")).toEqual(
      Timestamp.fromEpoch(1_526_063_310, 250_000_000),
    )
  })

  it("accepts the leap day of a leap year", () => {
    expect(parseRfc3339Weak("2020-02-29 00:00:00")).toEqual(Timestamp.fromEpoch(1_582_934_400))
  })

  it("accepts the last representable second", () => {
    expect(parseRfc3339Weak("9999-12-31 23:59:59").epochSeconds).toBe(253_402_300_799)
  })

  describe("rejections", () => {
    it.each([
      ["too short", "2018-05-11 18:28"],
      ["date/time out of order", "18:28:30 2018-05-11"],
      ["slashes", "2018/05/11 18:28:30"],
      ["trailing garbage", "2018-05-11 18:28:30 UTC"],
      ["empty fraction", "2018-05-11 18:28:30."],
      ["ten fraction digits", "2018-05-11 18:28:30.1234567890"],
    ])("%s is invalid_format", (_, input) => {
      expect(rejection(parseRfc3339Weak, input).code).toBe("invalid_format")
    })

    it("reports a non-digit field", () => {
      const err = rejection(parseRfc3339Weak, "2018-0x-11 18:28:30")

      expect(err.code).toBe("invalid_digit")
      expect(err.message).toBe("expected digit at 6")
    })

    it.each([
      ["year before 1970", "1969-12-31 23:59:59"],
      ["month 13", "2018-13-01 00:00:00"],
      ["month 0", "2018-00-01 00:00:00"],
      ["day 0", "2018-05-00 00:00:00"],
      ["April 31", "2018-04-31 00:00:00"],
      ["February 29 outside a leap year", "2019-02-29 00:00:00"],
      ["February 29 in 1900-style century", "2100-02-29 00:00:00"],
      ["hour 24", "2018-05-11 24:00:00"],
      ["minute 60", "2018-05-11 18:60:00"],
      ["second 60", "2018-05-11 18:28:60"],
    ])("%s is out_of_range", (_, input) => {
      expect(rejection(parseRfc3339Weak, input).code).toBe("out_of_range")
    })
  })
})
