import { Effect, Option, pipe } from "effect"
import { DiskServiceTag, type DiskError } from "../services/DiskService"
import { LoggerServiceTag } from "../services/LoggerService"
import type { PromptServiceTag } from "../infra/PromptService"
import type { ExternalDisk } from "../domain/ExternalDisk"
import { RESTORE_PROGRESS } from "../domain/Progress"
import type { RunConfig } from "../domain/RunConfig"
import { selectDisk, type SelectionError } from "./selectDisk"
import { CONFIRMATION_WORD, confirmTyped } from "./confirm"
import { makeProgressReporter } from "./progress"

export type RestoreOutcome =
  | { readonly _tag: "Cancelled" }
  | { readonly _tag: "Restored"; readonly disk: ExternalDisk }

/**
 * Returns a multiboot disk to a single ExFAT volume.
 */
export const restoreExternalDisk = (
  config: Pick<RunConfig, "maxSelectionAttempts">
): Effect.Effect<RestoreOutcome, DiskError | SelectionError, DiskServiceTag | PromptServiceTag | LoggerServiceTag> =>
  Effect.gen(function* () {
    const disks = yield* DiskServiceTag
    const logger = yield* LoggerServiceTag

    yield* logger.restore.header
    yield* logger.common.searchingDisks

    const found = yield* disks.listExternalDisks()
    const selected = yield* selectDisk(found, config.maxSelectionAttempts)
    if (Option.isNone(selected)) {
      yield* logger.common.cancelled
      return { _tag: "Cancelled" } as const
    }
    const disk = selected.value

    yield* logger.restore.eraseWarning(disk)
    if (!(yield* confirmTyped(`Type ${CONFIRMATION_WORD} to erase ${disk.deviceNode}`))) {
      yield* logger.common.cancelled
      return { _tag: "Cancelled" } as const
    }

    yield* pipe(
      Effect.gen(function* () {
        yield* logger.common.unmounting(disk)
        yield* disks.unmountDisk(disk)
        yield* logger.restore.restoring(disk)
        const reporter = yield* makeProgressReporter(RESTORE_PROGRESS)
        yield* disks.eraseToExFat(disk, reporter)
      }),
      Effect.tapError(() => logger.restore.manualCommand(disk))
    )

    yield* logger.restore.restored(disk)
    return { _tag: "Restored", disk } as const
  })
