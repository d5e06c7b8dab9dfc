import type { AppError } from "../../ports/error"

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime())
}

/**
 * Structural check for the AppError shape.
 *
 * Matches BaseError instances and anything that looks like one, such as an
 * error raised by a second copy of this package in the same process.
 *
 * @example
 * ```ts
 * try {
 *   deserialize(humanTime.duration, input)
 * } catch (err) {
 *   if (isAppError(err) && err.isOperational) {
 *     return reply(400, err.code)
 *   }
 *   throw err
 * }
 * ```
 */
export function isAppError(value: unknown): value is AppError {
  if (!isRecord(value)) return false

  return (
    typeof value.code === "string" &&
    isRecord(value.context) &&
    typeof value.isRetryable === "boolean" &&
    typeof value.isOperational === "boolean" &&
    isValidDate(value.timestamp) &&
    typeof value.message === "string" &&
    typeof value.name === "string"
  )
}
