import { BaseError } from "@chronotext/errors"
import { describeReceived, formatPath, InvalidValueError } from "../invalid-value-error"

describe("InvalidValueError", () => {
  it("describes an unparseable string", () => {
    const err = new InvalidValueError({
      expected: "a duration",
      received: "not a duration",
      reason: "unparseable",
    })

    expect(err.message).toBe('invalid value: string "not a duration", expected a duration')
  })

  it("describes a value of the wrong type", () => {
    const err = new InvalidValueError({ expected: "a duration", received: 42, reason: "type_mismatch" })

    expect(err.message).toBe("invalid type: number 42, expected a duration")
  })

  it("describes a missing value", () => {
    const err = new InvalidValueError({ expected: "a duration or null", reason: "missing" })

    expect(err.message).toBe("missing value, expected a duration or null")
  })

  it("appends the path when there is one", () => {
    const err = new InvalidValueError({
      expected: "a timestamp",
      received: "soon",
      reason: "unparseable",
      path: "items[0].at",
    })

    expect(err.message).toBe('invalid value: string "soon", expected a timestamp at items[0].at')
  })

  it("is an operational BaseError with structured context", () => {
    const cause = new Error("grammar")
    const err = new InvalidValueError(
      { expected: "a duration", received: "15x", reason: "unparseable" },
      { cause },
    )

    expect(err).toBeInstanceOf(BaseError)
    expect(err.code).toBe("invalid_value")
    expect(err.isOperational).toBe(true)
    expect(err.isRetryable).toBe(false)
    expect(err.cause).toBe(cause)
    expect(err.context).toEqual({ expected: "a duration", received: "15x", reason: "unparseable" })
    expect(err.reason).toBe("unparseable")
    expect(err.received).toBe("15x")
    expect(err.path).toBeUndefined()
  })

  describe("fromZodError", () => {
    it("restores a codec issue with its path", () => {
      const err = InvalidValueError.fromZodError({
        issues: [
          {
            code: "custom",
            path: ["retry", "backoff"],
            message: "ignored",
            params: { reason: "type_mismatch", expected: "a duration", received: true },
          },
        ],
      })

      expect(err.reason).toBe("type_mismatch")
      expect(err.expected).toBe("a duration")
      expect(err.received).toBe(true)
      expect(err.path).toBe("retry.backoff")
      expect(err.message).toBe("invalid type: boolean true, expected a duration at retry.backoff")
    })

    it("reports foreign issues as schema failures", () => {
      const err = InvalidValueError.fromZodError({
        issues: [{ code: "invalid_type", path: ["name"], message: "Invalid input" }],
      })

      expect(err.reason).toBe("schema")
      expect(err.path).toBe("name")
      expect(err.message).toBe("Invalid input at name")
    })

    it("ignores custom issues without codec params", () => {
      const err = InvalidValueError.fromZodError({
        issues: [{ code: "custom", path: [], message: "nope", params: { reason: "other" } }],
      })

      expect(err.reason).toBe("schema")
      expect(err.path).toBeUndefined()
      expect(err.message).toBe("nope")
    })

    it("copes with an empty issue list", () => {
      expect(InvalidValueError.fromZodError({ issues: [] }).message).toBe("a valid document")
    })
  })
})

describe("describeReceived", () => {
  it.each([
    ["15s", 'string "15s"'],
    [42, "number 42"],
    [false, "boolean false"],
    [null, "null"],
    [undefined, "nothing"],
    [[1], "array"],
    [{ seconds: 1 }, "object"],
  ])("%j reads as %s", (input, text) => {
    expect(describeReceived(input)).toBe(text)
  })
})

describe("formatPath", () => {
  it("joins keys with dots and indexes with brackets", () => {
    expect(formatPath(["items", 0, "at"])).toBe("items[0].at")
  })

  it("starts with an index for top-level arrays", () => {
    expect(formatPath([2, "ttl"])).toBe("[2].ttl")
  })

  it("is empty for the root", () => {
    expect(formatPath([])).toBe("")
  })
})
