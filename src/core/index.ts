import { Layer, pipe } from "effect"

export type { InstallerRecord, MacOSRelease } from "../domain/Installer"
export type { ExternalDisk } from "../domain/ExternalDisk"
export type { PartitionPlan, PartitionPlanEntry, AllocationStrategy } from "../domain/PartitionPlan"
export type { MediaReport, MediaResult } from "../domain/MediaReport"
export type { RunConfig } from "../domain/RunConfig"
export type { RunPhase } from "../domain/RunPhase"

export { prepareMultibootDisk, writeAllMedia, type RunOutcome } from "./prepareMultibootDisk"
export { restoreExternalDisk, type RestoreOutcome } from "./restoreExternalDisk"
export { listAvailable, type Inventory } from "./listAvailable"
export { selectDisk, parseDiskChoice, type SelectionError } from "./selectDisk"
export { confirmErase, confirmTyped } from "./confirm"

import { ShellServiceLive } from "../infra/ShellService"
import { PromptServiceLive } from "../infra/PromptService"
import { InstallerServiceLive } from "../services/InstallerService"
import { DiskServiceLive } from "../services/DiskService"
import { MediaServiceLive } from "../services/MediaService"
import { LoggerServiceLive } from "../services/LoggerService"

/**
 * Every service a command needs. Leaves FileSystem, CommandExecutor and
 * Terminal to the platform layer (NodeContext.layer).
 */
export const createAppLayer = () =>
  pipe(
    Layer.mergeAll(InstallerServiceLive, MediaServiceLive, LoggerServiceLive),
    Layer.provideMerge(DiskServiceLive),
    Layer.provideMerge(Layer.mergeAll(ShellServiceLive, PromptServiceLive))
  )

