import { Data, Effect, Option } from "effect"
import { PromptServiceTag } from "../infra/PromptService"
import { LoggerServiceTag } from "../services/LoggerService"
import type { ExternalDisk } from "../domain/ExternalDisk"

// =============================================================================
// Errors
// =============================================================================

export class NoExternalDisks extends Data.TaggedError("NoExternalDisks")<{}> {}

export class SelectionAttemptsExceeded extends Data.TaggedError("SelectionAttemptsExceeded")<{
  readonly attempts: number
}> {}

export type SelectionError = NoExternalDisks | SelectionAttemptsExceeded

// =============================================================================
// Selection
// =============================================================================

/** Zero-based index for a 1-based answer, if it names one of `count` disks */
export const parseDiskChoice = (input: string, count: number): Option.Option<number> => {
  const trimmed = input.trim()
  if (!/^\d+$/.test(trimmed)) return Option.none()
  const choice = parseInt(trimmed, 10)
  return choice >= 1 && choice <= count ? Option.some(choice - 1) : Option.none()
}

/**
 * Shows the numbered disk list and asks for a choice. None means the
 * operator quit the prompt.
 */
export const selectDisk = (
  disks: ReadonlyArray<ExternalDisk>,
  maxAttempts: number
): Effect.Effect<Option.Option<ExternalDisk>, SelectionError, PromptServiceTag | LoggerServiceTag> =>
  Effect.gen(function* () {
    if (disks.length === 0) {
      return yield* Effect.fail(new NoExternalDisks())
    }

    const prompt = yield* PromptServiceTag
    const logger = yield* LoggerServiceTag

    yield* logger.common.diskList(disks)

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const answer = yield* prompt.text(`Select the target disk [1-${disks.length}]`)
      if (Option.isNone(answer)) return Option.none()

      const disk = Option.flatMap(parseDiskChoice(answer.value, disks.length), (index) =>
        Option.fromNullable(disks[index])
      )
      if (Option.isSome(disk)) {
        yield* logger.common.diskSelected(disk.value)
        return disk
      }

      yield* logger.common.invalidChoice(disks.length)
    }

    return yield* Effect.fail(new SelectionAttemptsExceeded({ attempts: maxAttempts }))
  })
