import type { AppError, SerializedError } from "../ports/error"
import { isAppError } from "./utils/is-app-error"

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

function stackOf(err: Error, options: SerializeOptions): Pick<SerializedError, "stack"> {
  return options.includeStack && err.stack ? { stack: err.stack } : {}
}

function causeOf(err: Error, options: SerializeOptions): Pick<SerializedError, "cause"> {
  return err.cause === undefined ? {} : { cause: serializeError(err.cause, options) }
}

function fromAppError(err: AppError, options: SerializeOptions): SerializedError {
  return {
    name: err.name,
    code: err.code,
    message: err.message,
    context: { ...err.context },
    isOperational: err.isOperational,
    timestamp: err.timestamp.toISOString(),
    ...causeOf(err, options),
    ...stackOf(err, options),
  }
}

function fromNativeError(err: Error, options: SerializeOptions): SerializedError {
  return {
    name: err.name,
    code: "unknown",
    message: err.message,
    context: {},
    isOperational: false,
    timestamp: new Date().toISOString(),
    ...causeOf(err, options),
    ...stackOf(err, options),
  }
}

/**
 * Turn anything thrown into a JSON-safe record.
 *
 * AppErrors (checked structurally) keep their code, context and flags.
 * Plain Errors get code "unknown" and count as non-operational. Any other
 * thrown value ends up in `context.value`. Causes are followed recursively.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  if (isAppError(err)) return fromAppError(err, options)
  if (err instanceof Error) return fromNativeError(err, options)

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
