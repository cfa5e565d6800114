/**
 * DiskService - external disk discovery and the destructive diskutil calls.
 *
 * Exposes typed errors for all failure modes. Raw tool output is carried on
 * execution errors so the CLI can show what diskutil said.
 */

import { Array as Arr, Context, Data, Effect, Layer, Option, Schema, pipe } from "effect"
import { ShellServiceTag, combinedOutput, type ExecOptions, type ShellError } from "../infra/ShellService"
import type { ExternalDisk } from "../domain/ExternalDisk"
import type { PartitionPlan } from "../domain/PartitionPlan"
import { decodePlist } from "../lib/plist"

// =============================================================================
// Service errors
// =============================================================================

export class DiskutilUnavailable extends Data.TaggedError("DiskutilUnavailable")<{
  readonly reason: string
}> {}

export class DiskListFailed extends Data.TaggedError("DiskListFailed")<{
  readonly reason: string
}> {}

export class DiskInfoUnavailable extends Data.TaggedError("DiskInfoUnavailable")<{
  readonly device: string
  readonly reason: string
}> {}

export class DiskBusy extends Data.TaggedError("DiskBusy")<{
  readonly device: string
  readonly processName?: string
  readonly processId?: string
  readonly output: string
}> {}

export class PartitionFailed extends Data.TaggedError("PartitionFailed")<{
  readonly device: string
  readonly exitCode: number
  readonly output: string
}> {}

export class RestoreFailed extends Data.TaggedError("RestoreFailed")<{
  readonly device: string
  readonly exitCode: number
  readonly output: string
}> {}

export type DiskError =
  | DiskutilUnavailable
  | DiskListFailed
  | DiskInfoUnavailable
  | DiskBusy
  | PartitionFailed
  | RestoreFailed

// =============================================================================
// Service interface
// =============================================================================

export interface DiskService {
  readonly listExternalDisks: () => Effect.Effect<ExternalDisk[], DiskError>
  readonly getDiskInfo: (device: string) => Effect.Effect<ExternalDisk, DiskError>
  readonly isVolumeMounted: (path: string) => Effect.Effect<boolean>
  readonly unmountDisk: (disk: ExternalDisk) => Effect.Effect<void, DiskError>
  readonly eraseAndPartition: (
    disk: ExternalDisk,
    plan: PartitionPlan,
    onLine?: ExecOptions["onLine"]
  ) => Effect.Effect<void, DiskError>
  readonly eraseToExFat: (disk: ExternalDisk, onLine?: ExecOptions["onLine"]) => Effect.Effect<void, DiskError>
}

export class DiskServiceTag extends Context.Tag("DiskService")<DiskServiceTag, DiskService>() {}

// =============================================================================
// diskutil plist shapes
// =============================================================================

const PARTITION_SCHEMES = ["GUID_partition_scheme", "FDisk_partition_scheme", "Apple_partition_scheme"]

const DiskList = Schema.Struct({
  AllDisksAndPartitions: Schema.optionalWith(
    Schema.Array(
      Schema.Struct({
        DeviceIdentifier: Schema.String,
        Content: Schema.optional(Schema.String),
        MountPoint: Schema.optional(Schema.String),
        Partitions: Schema.optionalWith(
          Schema.Array(Schema.Struct({ MountPoint: Schema.optional(Schema.String) })),
          { default: () => [] }
        ),
      })
    ),
    { default: () => [] }
  ),
})

const DiskInfo = Schema.Struct({
  DeviceIdentifier: Schema.String,
  DeviceNode: Schema.optional(Schema.String),
  MediaName: Schema.optionalWith(Schema.String, { default: () => "Unknown" }),
  TotalSize: Schema.optionalWith(Schema.Number, { default: () => 0 }),
  Ejectable: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  Internal: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  WholeDisk: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  MountPoint: Schema.optional(Schema.String),
})

type DiskInfo = typeof DiskInfo.Type

// =============================================================================
// Helpers
// =============================================================================

const BUSY_PATTERN = /in use by process (\d+) \(([^)]+)\)/

export const isBusyOutput = (output: string): boolean =>
  output.includes("in use by process") || output.includes("Couldn't unmount")

export const extractProcessInfo = (output: string): { processName?: string; processId?: string } => {
  const match = output.match(BUSY_PATTERN)
  return match ? { processId: match[1], processName: match[2] } : {}
}

/** Size argument for one partition: decimal megabytes, or `0b` for "the rest" */
export const partitionSizeArgument = (sizeBytes: number, takesRemainder: boolean): string =>
  takesRemainder ? "0b" : `${Math.floor(sizeBytes / 1_000_000)}M`

export const partitionDiskArguments = (deviceNode: string, plan: PartitionPlan): string[] => [
  "partitionDisk",
  deviceNode,
  "GPT",
  ...plan.entries.flatMap((entry) => [
    "JHFS+",
    entry.volumeName,
    partitionSizeArgument(entry.sizeBytes, entry.takesRemainder),
  ]),
]

const toExternalDisk = (info: DiskInfo, mounted: boolean): ExternalDisk => ({
  deviceIdentifier: info.DeviceIdentifier,
  deviceNode: info.DeviceNode ?? `/dev/${info.DeviceIdentifier}`,
  mediaName: info.MediaName,
  sizeBytes: info.TotalSize,
  mounted,
  internal: info.Internal,
})

const unavailable = (e: ShellError): DiskutilUnavailable =>
  new DiskutilUnavailable({ reason: e.notFound ? "diskutil was not found on this system" : e.message })

const busy = (device: string, output: string): DiskBusy =>
  new DiskBusy({ device, output, ...extractProcessInfo(output) })

// =============================================================================
// Live implementation (diskutil)
// =============================================================================

export const DiskServiceLive = Layer.effect(
  DiskServiceTag,
  Effect.gen(function* () {
    const shell = yield* ShellServiceTag

    const diskutil = (args: ReadonlyArray<string>, options?: ExecOptions) =>
      pipe(shell.exec("diskutil", args, options), Effect.mapError(unavailable))

    const readInfo = (device: string): Effect.Effect<DiskInfo, DiskError> =>
      Effect.gen(function* () {
        const result = yield* diskutil(["info", "-plist", device])
        if (result.exitCode !== 0) {
          return yield* Effect.fail(
            new DiskInfoUnavailable({ device, reason: combinedOutput(result) || `diskutil exited with ${result.exitCode}` })
          )
        }
        return yield* pipe(
          decodePlist(DiskInfo, result.stdout, "diskutil info"),
          Effect.mapError((e) => new DiskInfoUnavailable({ device, reason: e.reason }))
        )
      })

    const listExternalDisks = (): Effect.Effect<ExternalDisk[], DiskError> =>
      Effect.gen(function* () {
        const result = yield* diskutil(["list", "-plist"])
        if (result.exitCode !== 0) {
          return yield* Effect.fail(new DiskListFailed({ reason: combinedOutput(result) }))
        }

        const list = yield* pipe(
          decodePlist(DiskList, result.stdout, "diskutil list"),
          Effect.mapError((e) => new DiskListFailed({ reason: e.reason }))
        )

        const candidates = list.AllDisksAndPartitions.filter(
          (disk) => disk.Content === undefined || disk.Content === "" || PARTITION_SCHEMES.includes(disk.Content)
        )

        const disks = yield* Effect.forEach(candidates, (disk) =>
          pipe(
            readInfo(disk.DeviceIdentifier),
            Effect.map((info): Option.Option<ExternalDisk> => {
              const mounted = disk.MountPoint !== undefined || disk.Partitions.some((p) => p.MountPoint !== undefined)
              return info.Ejectable && !info.Internal && info.WholeDisk
                ? Option.some(toExternalDisk(info, mounted))
                : Option.none()
            }),
            Effect.catchTag("DiskInfoUnavailable", (e) =>
              pipe(Effect.logDebug(`Skipping ${e.device}: ${e.reason}`), Effect.as(Option.none<ExternalDisk>()))
            )
          )
        )

        return Arr.getSomes(disks)
      })

    const getDiskInfo = (device: string): Effect.Effect<ExternalDisk, DiskError> =>
      pipe(
        readInfo(device),
        Effect.map((info) => toExternalDisk(info, info.MountPoint !== undefined && info.MountPoint !== ""))
      )

    const isVolumeMounted = (path: string): Effect.Effect<boolean> =>
      pipe(
        shell.exec("diskutil", ["info", path]),
        Effect.map((result) => result.exitCode === 0 && /Mounted:\s+Yes/.test(result.stdout)),
        Effect.orElseSucceed(() => false)
      )

    const unmountDisk = (disk: ExternalDisk): Effect.Effect<void, DiskError> =>
      Effect.gen(function* () {
        const result = yield* diskutil(["unmountDisk", disk.deviceNode])
        if (result.exitCode === 0) return

        const output = combinedOutput(result)
        if (isBusyOutput(output)) {
          return yield* Effect.fail(busy(disk.deviceNode, output))
        }
        yield* Effect.logWarning(`Could not unmount ${disk.deviceNode}, continuing: ${output}`)
      })

    const eraseAndPartition: DiskService["eraseAndPartition"] = (disk, plan, onLine) =>
      Effect.gen(function* () {
        const args = partitionDiskArguments(disk.deviceNode, plan)
        yield* Effect.logInfo(`diskutil ${args.join(" ")}`)

        const result = yield* diskutil(args, { onLine })
        if (result.exitCode === 0) return

        const output = combinedOutput(result)
        return yield* Effect.fail(
          isBusyOutput(output)
            ? busy(disk.deviceNode, output)
            : new PartitionFailed({ device: disk.deviceNode, exitCode: result.exitCode, output })
        )
      })

    const eraseToExFat: DiskService["eraseToExFat"] = (disk, onLine) =>
      Effect.gen(function* () {
        const result = yield* diskutil(["eraseDisk", "ExFAT", "USB_DISK", disk.deviceNode], { onLine })
        if (result.exitCode !== 0) {
          return yield* Effect.fail(
            new RestoreFailed({ device: disk.deviceNode, exitCode: result.exitCode, output: combinedOutput(result) })
          )
        }
      })

    return {
      listExternalDisks,
      getDiskInfo,
      isVolumeMounted,
      unmountDisk,
      eraseAndPartition,
      eraseToExFat,
    }
  })
)
