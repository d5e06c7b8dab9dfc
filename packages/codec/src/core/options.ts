import { createError } from "@chronotext/errors"
import { timestampPrecisions } from "@chronotext/grammar"
import { z } from "zod"
import { absentPolicies } from "./adapters/optional-adapter"

export const humanTimeOptionsSchema = z.strictObject({
  /** Fraction digits written for timestamps */
  precision: z.enum(timestampPrecisions).default("smart"),
  /** What a missing optional field decodes to */
  absent: z.enum(absentPolicies).default("reject"),
})

export type HumanTimeOptions = z.input<typeof humanTimeOptionsSchema>
export type ResolvedHumanTimeOptions = z.output<typeof humanTimeOptionsSchema>

export function resolveOptions(options: unknown = {}): ResolvedHumanTimeOptions {
  const result = humanTimeOptionsSchema.safeParse(options)

  if (!result.success) {
    throw createError("invalid_options", `Invalid humantime options\n${z.prettifyError(result.error)}`, {
      context: {
        issues: result.error.issues.map((issue) => ({
          path: issue.path.map(String).join("."),
          message: issue.message,
        })),
      },
      isOperational: false,
    })
  }

  return result.data
}
