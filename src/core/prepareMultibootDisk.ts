/**
 * The multiboot run: Discover → Select → Plan → Confirm → Erase → Write.
 *
 * Any failure is wrapped in RunAborted with the phase it happened in. Write
 * failures are not: each volume's outcome goes into the report and the next
 * volume is attempted, unless the disk itself has gone away.
 */

import { Effect, Either, Option, pipe } from "effect"
import { InstallerServiceTag } from "../services/InstallerService"
import { DiskServiceTag } from "../services/DiskService"
import { MediaServiceTag, describeMediaError, mediaErrorOutput } from "../services/MediaService"
import { LoggerServiceTag } from "../services/LoggerService"
import type { PromptServiceTag } from "../infra/PromptService"
import { usableCapacity, type ExternalDisk } from "../domain/ExternalDisk"
import { planPartitions, type PartitionPlan } from "../domain/PartitionPlan"
import { summarize, type MediaReport, type MediaResult } from "../domain/MediaReport"
import { MEDIA_PROGRESS, PARTITION_PROGRESS } from "../domain/Progress"
import { RunAborted, type RunPhase } from "../domain/RunPhase"
import type { RunConfig } from "../domain/RunConfig"
import { selectDisk } from "./selectDisk"
import { confirmErase } from "./confirm"
import { makeProgressReporter } from "./progress"

export type RunOutcome =
  | { readonly _tag: "NoInstallers" }
  | { readonly _tag: "Cancelled"; readonly phase: RunPhase }
  | { readonly _tag: "Completed"; readonly disk: ExternalDisk; readonly report: MediaReport }

type RunServices = InstallerServiceTag | DiskServiceTag | MediaServiceTag | PromptServiceTag | LoggerServiceTag

const inPhase =
  (phase: RunPhase) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, RunAborted, R> =>
    Effect.mapError(effect, (error) => new RunAborted({ phase, error }))

const noInstallers: RunOutcome = { _tag: "NoInstallers" }

const cancelled = (phase: RunPhase): RunOutcome => ({ _tag: "Cancelled", phase })

const completed = (disk: ExternalDisk, report: MediaReport): RunOutcome => ({ _tag: "Completed", disk, report })

// =============================================================================
// Write phase
// =============================================================================

export const writeAllMedia = (
  disk: ExternalDisk,
  plan: PartitionPlan,
  config: RunConfig
): Effect.Effect<MediaReport, never, DiskServiceTag | MediaServiceTag | LoggerServiceTag> =>
  Effect.gen(function* () {
    const disks = yield* DiskServiceTag
    const media = yield* MediaServiceTag
    const logger = yield* LoggerServiceTag

    const total = plan.entries.length
    const results: MediaResult[] = []

    yield* logger.run.writingMedia(total)

    for (const [position, entry] of plan.entries.entries()) {
      yield* logger.run.writingEntry(entry, position + 1, total)

      const reporter = yield* makeProgressReporter(MEDIA_PROGRESS)
      const outcome = yield* Effect.either(media.write(entry, config, reporter))

      if (Either.isRight(outcome)) {
        results.push({ entry, status: "succeeded", volumePath: outcome.right })
        yield* logger.run.entrySucceeded(entry, outcome.right)
        continue
      }

      const reason = describeMediaError(outcome.left)
      const output = mediaErrorOutput(outcome.left)
      results.push({ entry, status: "failed", reason, output })
      yield* logger.run.entryFailed(entry, reason, output)

      const diskPresent = yield* pipe(
        disks.getDiskInfo(disk.deviceNode),
        Effect.as(true),
        Effect.orElseSucceed(() => false)
      )
      if (!diskPresent) {
        const remaining = plan.entries.slice(position + 1)
        yield* logger.run.diskGone(disk, remaining.length)
        for (const skipped of remaining) {
          results.push({ entry: skipped, status: "skipped", reason: `${disk.deviceNode} is no longer available` })
        }
        break
      }
    }

    return summarize(results)
  })

// =============================================================================
// Run
// =============================================================================

export const prepareMultibootDisk = (config: RunConfig): Effect.Effect<RunOutcome, RunAborted, RunServices> =>
  Effect.gen(function* () {
    const installerService = yield* InstallerServiceTag
    const disks = yield* DiskServiceTag
    const logger = yield* LoggerServiceTag

    yield* logger.run.header

    // Discover
    yield* logger.common.searchingInstallers(config.appDir)
    const installers = yield* inPhase("Discover")(installerService.discover(config.appDir))
    if (installers.length === 0) {
      yield* logger.common.noInstallersFound(config.appDir)
      return noInstallers
    }
    yield* Effect.forEach(installers, logger.common.installerFound, { discard: true })
    yield* logger.common.sizeSummary(installers, config.marginBytes)

    // Select
    yield* logger.common.searchingDisks
    const selected = yield* inPhase("Select")(
      pipe(
        disks.listExternalDisks(),
        Effect.flatMap((found) => selectDisk(found, config.maxSelectionAttempts))
      )
    )
    if (Option.isNone(selected)) {
      yield* logger.common.cancelled
      return cancelled("Select")
    }
    const disk = selected.value

    // Plan
    const plan = yield* inPhase("Plan")(
      planPartitions(installers, usableCapacity(disk, config.reservedBytes), {
        strategy: config.strategy,
        marginBytes: config.marginBytes,
      })
    )
    yield* logger.run.planSummary(plan)

    // Confirm
    if (!(yield* confirmErase(disk, plan))) {
      yield* logger.common.cancelled
      return cancelled("Confirm")
    }

    // Erase
    yield* inPhase("Erase")(
      Effect.gen(function* () {
        yield* logger.common.unmounting(disk)
        yield* disks.unmountDisk(disk)
        yield* logger.run.partitioning(disk)
        const reporter = yield* makeProgressReporter(PARTITION_PROGRESS)
        yield* disks.eraseAndPartition(disk, plan, reporter)
        yield* logger.run.partitioned
      })
    )

    // Write
    const report = yield* writeAllMedia(disk, plan, config)
    yield* logger.run.report(report)

    return completed(disk, report)
  })
