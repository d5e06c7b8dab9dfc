import type { ErrorCode } from "../../ports/error"
import { BaseError, type BaseErrorOptions } from "../base-error"

/**
 * Build a BaseError without declaring a dedicated subclass.
 *
 * Meant for invariant violations that callers are not expected to branch on.
 *
 * @example
 * ```ts
 * throw createError("invalid_duration", "Duration seconds must be a non-negative safe integer", {
 *   context: { seconds: -1 },
 *   isOperational: false,
 * })
 * ```
 */
export function createError<C extends ErrorCode>(
  code: C,
  message: string,
  options?: Omit<BaseErrorOptions<C>, "code">,
): BaseError<C> {
  return new BaseError(message, { code, ...options })
}
