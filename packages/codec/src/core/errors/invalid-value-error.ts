import { BaseError } from "@chronotext/errors"

export const invalidValueReasons = ["type_mismatch", "unparseable", "missing", "schema"] as const

/**
 * Why a value was rejected.
 *
 * - `type_mismatch`: the input was not a string (or null, for optional values)
 * - `unparseable`: a string that the grammar refused
 * - `missing`: the field was absent and the absent policy is "reject"
 * - `schema`: a failure reported by a surrounding schema, not by a codec
 */
export type InvalidValueReason = (typeof invalidValueReasons)[number]

export type InvalidValueDetails = Readonly<{
  /** What was expected, e.g. "a duration" or "a timestamp or null" */
  expected: string
  reason: InvalidValueReason
  received?: unknown
  /** Location inside a document, e.g. `items[0].at` */
  path?: string
}>

/** Minimal view of a schema issue; `z.ZodError` issues satisfy it. */
export type SchemaIssue = Readonly<{
  code: string
  path: ReadonlyArray<PropertyKey>
  message: string
  params?: Readonly<Record<string, unknown>>
}>

/**
 * Render an input for diagnostics: `string "15x"`, `number 42`, `null`.
 */
export function describeReceived(input: unknown): string {
  if (input === null) return "null"
  if (input === undefined) return "nothing"
  if (Array.isArray(input)) return "array"

  switch (typeof input) {
    case "string":
      return `string ${JSON.stringify(input)}`
    case "number":
    case "boolean":
    case "bigint":
      return `${typeof input} ${String(input)}`
    default:
      return typeof input
  }
}

/**
 * Render an issue path: `["items", 0, "at"]` becomes `items[0].at`.
 */
export function formatPath(path: ReadonlyArray<PropertyKey>): string {
  let out = ""

  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`
    } else {
      const key = typeof segment === "symbol" ? segment.toString() : segment
      out += out === "" ? key : `.${key}`
    }
  }

  return out
}

function describe(details: InvalidValueDetails): string {
  const base = (() => {
    switch (details.reason) {
      case "type_mismatch":
        return `invalid type: ${describeReceived(details.received)}, expected ${details.expected}`
      case "unparseable":
        return `invalid value: ${describeReceived(details.received)}, expected ${details.expected}`
      case "missing":
        return `missing value, expected ${details.expected}`
      case "schema":
        return details.expected
    }
  })()

  return details.path ? `${base} at ${details.path}` : base
}

function isReason(value: unknown): value is InvalidValueReason {
  return invalidValueReasons.some((reason) => reason === value)
}

/**
 * Raised when an input cannot be turned into a time value.
 *
 * @remarks
 * Always operational: the input came from outside. The grammar failure, when
 * there is one, is kept as `cause`.
 *
 * @example
 * ```ts
 * try {
 *   deserialize(humanTime.duration, "15x")
 * } catch (err) {
 *   if (err instanceof InvalidValueError) {
 *     console.error(err.reason, err.received) // "unparseable" "15x"
 *   }
 * }
 * ```
 */
export class InvalidValueError extends BaseError<"invalid_value"> {
  readonly expected: string
  readonly reason: InvalidValueReason
  readonly received: unknown
  readonly path: string | undefined

  constructor(details: InvalidValueDetails, options: Readonly<{ cause?: unknown }> = {}) {
    super(describe(details), {
      code: "invalid_value",
      context: { ...details },
      cause: options.cause,
    })

    this.expected = details.expected
    this.reason = details.reason
    this.received = details.received
    this.path = details.path
  }

  /**
   * Rebuild the first issue of a failed schema run as an InvalidValueError.
   *
   * Issues raised by a time codec carry their reason and expectation in
   * `params` and come back unchanged apart from the path; any other issue is
   * reported with reason `schema`.
   */
  static fromZodError(error: Readonly<{ issues: ReadonlyArray<SchemaIssue> }>): InvalidValueError {
    const issue = error.issues[0]

    if (!issue) {
      return new InvalidValueError({ expected: "a valid document", reason: "schema" })
    }

    const path = issue.path.length > 0 ? formatPath(issue.path) : undefined
    const params = issue.params

    if (
      issue.code === "custom" &&
      params &&
      isReason(params.reason) &&
      typeof params.expected === "string"
    ) {
      return new InvalidValueError(
        {
          expected: params.expected,
          reason: params.reason,
          received: params.received,
          path,
        },
        { cause: error },
      )
    }

    return new InvalidValueError(
      { expected: issue.message, reason: "schema", received: undefined, path },
      { cause: error },
    )
  }
}
