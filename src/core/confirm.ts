import { Effect, Option, pipe } from "effect"
import { PromptServiceTag } from "../infra/PromptService"
import { DiskServiceTag } from "../services/DiskService"
import { LoggerServiceTag } from "../services/LoggerService"
import type { ExternalDisk } from "../domain/ExternalDisk"
import type { PartitionPlan } from "../domain/PartitionPlan"

export const CONFIRMATION_WORD = "YES"

/** True only when the operator types the confirmation word exactly */
export const confirmTyped = (message: string): Effect.Effect<boolean, never, PromptServiceTag> =>
  Effect.gen(function* () {
    const prompt = yield* PromptServiceTag
    const answer = yield* prompt.text(message)
    return Option.exists(answer, (value) => value === CONFIRMATION_WORD)
  })

/**
 * Last gate before the disk is erased. The disk is re-read first: one that
 * reports itself internal needs a second, separate confirmation.
 */
export const confirmErase = (
  disk: ExternalDisk,
  plan: PartitionPlan
): Effect.Effect<boolean, never, PromptServiceTag | DiskServiceTag | LoggerServiceTag> =>
  Effect.gen(function* () {
    const disks = yield* DiskServiceTag
    const logger = yield* LoggerServiceTag

    const current = yield* pipe(
      disks.getDiskInfo(disk.deviceNode),
      Effect.tapError((e) => Effect.logWarning(`Could not re-check ${disk.deviceNode} (${e._tag})`)),
      Effect.option
    )
    const internal = Option.match(current, { onNone: () => disk.internal, onSome: (info) => info.internal })

    if (internal) {
      yield* logger.run.internalDiskWarning(disk)
      if (!(yield* confirmTyped(`Type ${CONFIRMATION_WORD} to continue with an internal disk`))) {
        return false
      }
    }

    yield* logger.run.eraseWarning(disk, plan)
    return yield* confirmTyped(`Type ${CONFIRMATION_WORD} to erase ${disk.deviceNode}`)
  })
