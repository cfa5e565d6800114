import { Effect } from "effect"
import { InstallerServiceTag, type InstallerError } from "../services/InstallerService"
import { DiskServiceTag, type DiskError } from "../services/DiskService"
import { LoggerServiceTag } from "../services/LoggerService"
import type { InstallerRecord } from "../domain/Installer"
import type { ExternalDisk } from "../domain/ExternalDisk"
import type { RunConfig } from "../domain/RunConfig"

export interface Inventory {
  readonly installers: ReadonlyArray<InstallerRecord>
  readonly disks: ReadonlyArray<ExternalDisk>
}

/**
 * Read-only overview: installers in the app directory and attached
 * external disks. Nothing is prompted for or changed.
 */
export const listAvailable = (
  config: Pick<RunConfig, "appDir" | "marginBytes">
): Effect.Effect<Inventory, InstallerError | DiskError, InstallerServiceTag | DiskServiceTag | LoggerServiceTag> =>
  Effect.gen(function* () {
    const installerService = yield* InstallerServiceTag
    const diskService = yield* DiskServiceTag
    const logger = yield* LoggerServiceTag

    yield* logger.list.header

    yield* logger.common.searchingInstallers(config.appDir)
    const installers = yield* installerService.discover(config.appDir)
    if (installers.length === 0) {
      yield* logger.common.noInstallersFound(config.appDir)
    } else {
      yield* Effect.forEach(installers, logger.common.installerFound, { discard: true })
      yield* logger.common.sizeSummary(installers, config.marginBytes)
    }

    yield* logger.common.searchingDisks
    const disks = yield* diskService.listExternalDisks()
    if (disks.length === 0) {
      yield* logger.list.noDisksFound
    } else {
      yield* logger.common.diskList(disks)
    }

    return { installers, disks }
  })
