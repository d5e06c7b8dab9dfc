import { DurationError } from "../grammar-error"
import { Duration } from "./duration"
import { durationUnits } from "./duration-units"

const BIG_NANOS_PER_SECOND = 1_000_000_000n
const MAX_TOTAL_NANOS = BigInt(Number.MAX_SAFE_INTEGER) * BIG_NANOS_PER_SECOND + 999_999_999n

const isDigit = (ch: string | undefined) => ch !== undefined && ch >= "0" && ch <= "9"
const isUnitChar = (ch: string | undefined) => ch !== undefined && /^[A-Za-zµ]$/.test(ch)
const isSpace = (ch: string | undefined) => ch !== undefined && /^\s$/.test(ch)

/**
 * Parse free-form duration text such as `15s`, `15 seconds`, `2h30m` or
 * `1h 15m 20s`.
 *
 * The text is a sequence of `<integer><unit>` items, optionally separated by
 * whitespace; their lengths add up. See `durationUnits` for the spellings.
 *
 * @throws DurationError when the text does not follow the grammar or the
 *   total does not fit in a `Duration`.
 */
export function parseDuration(input: string): Duration {
  let pos = 0
  let total = 0n

  const skipSpace = () => {
    while (isSpace(input[pos])) pos++
  }

  skipSpace()
  if (pos === input.length) {
    throw new DurationError("empty", "value was empty", { input })
  }

  while (pos < input.length) {
    const numberStart = pos
    while (isDigit(input[pos])) pos++

    if (pos === numberStart) {
      if (isUnitChar(input[pos])) {
        throw new DurationError("number_expected", `expected number at ${pos}`, {
          input,
          position: pos,
        })
      }
      throw new DurationError("invalid_character", `invalid character at ${pos}`, {
        input,
        position: pos,
      })
    }

    const value = BigInt(input.slice(numberStart, pos))
    skipSpace()

    const unitStart = pos
    while (isUnitChar(input[pos])) pos++
    const unit = input.slice(unitStart, pos)

    if (unit === "" && pos < input.length) {
      throw new DurationError("invalid_character", `invalid character at ${pos}`, {
        input,
        position: pos,
      })
    }

    const unitNanos = durationUnits.get(unit)
    if (unitNanos === undefined) {
      const message =
        unit === ""
          ? `time unit needed, for example ${value}sec or ${value}ms`
          : `unknown time unit "${unit}"`

      throw new DurationError("unknown_unit", message, { input, unit, position: unitStart })
    }

    total += value * unitNanos
    if (total > MAX_TOTAL_NANOS) {
      throw new DurationError("number_overflow", "number is too large", { input })
    }

    skipSpace()
  }

  return Duration.ofNanos(total)
}
