import { TimestampError } from "../grammar-error"
import { Timestamp } from "./timestamp"

type Mode = "strict" | "weak"

// YYYY-MM-DDTHH:MM:SS
const DIGIT_POSITIONS = [0, 1, 2, 3, 5, 6, 8, 9, 11, 12, 14, 15, 17, 18]
const BASE_LENGTH = 19

const isDigit = (ch: string | undefined) => ch !== undefined && ch >= "0" && ch <= "9"

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
    return leap ? 29 : 28
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31
}

/**
 * Parse a strict RFC3339 UTC timestamp: `YYYY-MM-DDTHH:MM:SS[.fraction]Z`,
 * with up to nine fraction digits.
 *
 * @throws TimestampError
 */
export function parseRfc3339(input: string): Timestamp {
  return parseTimestamp(input, "strict")
}

/**
 * Parse an RFC3339 timestamp leniently: the date/time separator may be `T`,
 * `t` or a space, and the trailing `Z` may be left out (the value is UTC
 * either way).
 *
 * @example
 * ```ts
 * parseRfc3339Weak("2018-05-11 18:28:30") // same instant as "2018-05-11T18:28:30Z"
 * ```
 *
 * @throws TimestampError
 */
export function parseRfc3339Weak(input: string): Timestamp {
  return parseTimestamp(input, "weak")
}

function parseTimestamp(input: string, mode: Mode): Timestamp {
  const fail = (code: "invalid_format" | "invalid_digit" | "out_of_range", message: string) =>
    new TimestampError(code, message, { input, mode })

  if (input.length < BASE_LENGTH) throw fail("invalid_format", "timestamp is too short")

  const separator = input[10]
  const separatorOk = separator === "T" || (mode === "weak" && (separator === "t" || separator === " "))

  if (
    input[4] !== "-" ||
    input[7] !== "-" ||
    !separatorOk ||
    input[13] !== ":" ||
    input[16] !== ":"
  ) {
    throw fail("invalid_format", "timestamp must look like YYYY-MM-DDTHH:MM:SSZ")
  }

  for (const i of DIGIT_POSITIONS) {
    if (!isDigit(input[i])) throw fail("invalid_digit", `expected digit at ${i}`)
  }

  const field = (start: number, end: number) => Number(input.slice(start, end))
  const year = field(0, 4)
  const month = field(5, 7)
  const day = field(8, 10)
  const hour = field(11, 13)
  const minute = field(14, 16)
  const second = field(17, 19)

  let pos = BASE_LENGTH
  let nanos = 0

  if (input[pos] === ".") {
    const start = ++pos
    while (isDigit(input[pos])) pos++

    const digits = input.slice(start, pos)
    if (digits.length === 0 || digits.length > 9) {
      throw fail("invalid_format", "fraction must have between 1 and 9 digits")
    }
    nanos = Number(digits.padEnd(9, "0"))
  }

  const suffix = input.slice(pos)
  if (suffix !== "Z" && !(mode === "weak" && suffix === "")) {
    throw fail("invalid_format", mode === "weak" ? 'expected "Z" or end of input' : 'expected "Z"')
  }

  if (year < 1970) throw fail("out_of_range", "year before 1970")
  if (month < 1 || month > 12) throw fail("out_of_range", "month out of range")
  if (day < 1 || day > daysInMonth(year, month)) throw fail("out_of_range", "day out of range")
  if (hour > 23 || minute > 59 || second > 59) throw fail("out_of_range", "time out of range")

  const epochMillis = Date.UTC(year, month - 1, day, hour, minute, second)

  return Timestamp.fromEpoch(epochMillis / 1000, nanos)
}
