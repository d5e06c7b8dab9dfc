import { isGrammarError } from "@chronotext/grammar"
import type { Logger } from "@chronotext/logger"
import type { HumanTimeKind } from "../../ports/kinds"
import type { DecodeOutcome, ValueAdapter } from "../../ports/value-adapter"
import { InvalidValueError } from "../errors/invalid-value-error"

/** The grammar half of an adapter: how one kind is recognized, read and written. */
export type ValueGrammar<T> = Readonly<{
  kind: HumanTimeKind
  expecting: string
  is: (value: unknown) => value is T
  equals: (a: T, b: T) => boolean
  /** Throws a grammar error on rejection */
  parse: (text: string) => T
  format: (value: T) => string
}>

/**
 * Wrap a grammar as a ValueAdapter.
 *
 * `undefined` is `missing`, any other non-string input is a `type_mismatch`,
 * a grammar error is `unparseable`
 * with the grammar error as cause. Anything else thrown by `parse` is a bug
 * and propagates. Rejections are logged at debug.
 */
export function createValueAdapter<T>(grammar: ValueGrammar<T>, logger: Logger): ValueAdapter<T> {
  const { kind, expecting } = grammar
  const log = logger.child({ kind })

  const reject = (error: InvalidValueError): DecodeOutcome<T> => {
    log.debug("rejected input", { operation: "decode", reason: error.reason, err: error })
    return { kind: "invalid", error }
  }

  return {
    kind,
    expecting,
    is: grammar.is,
    equals: grammar.equals,

    decode(input: unknown): DecodeOutcome<T> {
      if (input === undefined) {
        return reject(new InvalidValueError({ expected: expecting, reason: "missing" }))
      }

      if (typeof input !== "string") {
        return reject(new InvalidValueError({ expected: expecting, received: input, reason: "type_mismatch" }))
      }

      try {
        return { kind: "decoded", value: grammar.parse(input) }
      } catch (err) {
        if (!isGrammarError(err)) throw err

        return reject(
          new InvalidValueError({ expected: expecting, received: input, reason: "unparseable" }, { cause: err }),
        )
      }
    },

    encode: (value: T): string => grammar.format(value),
  }
}
