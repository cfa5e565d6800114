import { Effect, Option, Ref } from "effect"
import { LoggerServiceTag } from "../services/LoggerService"
import { advanceProgress, type ProgressRule } from "../domain/Progress"

/**
 * Line handler for a long-running tool: every line goes to the debug log,
 * and each new stage is shown once.
 */
export const makeProgressReporter = (rules: ReadonlyArray<ProgressRule>) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag
    const current = yield* Ref.make(0)

    return (line: string): Effect.Effect<void> =>
      Effect.gen(function* () {
        yield* Effect.logDebug(line)
        const next = advanceProgress(rules, yield* Ref.get(current), line)
        if (Option.isSome(next)) {
          yield* Ref.set(current, next.value.percent)
          yield* logger.common.progress(next.value.label, next.value.percent)
        }
      })
  })
