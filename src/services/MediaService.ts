/**
 * MediaService - writes one installer onto its partition with the
 * installer's own `createinstallmedia` tool, then checks the result.
 */

import { Context, Data, Duration, Effect, Layer, Option, Schedule, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import { ShellServiceTag, combinedOutput, type ExecOptions } from "../infra/ShellService"
import { DiskServiceTag } from "./DiskService"
import { releaseKeywords } from "../domain/Installer"
import type { PartitionPlanEntry } from "../domain/PartitionPlan"
import type { RunConfig } from "../domain/RunConfig"
import { formatSize, parseDuKilobytes } from "../lib/parseSize"

// =============================================================================
// Service errors
// =============================================================================

export class MediaToolMissing extends Data.TaggedError("MediaToolMissing")<{
  readonly path: string
}> {}

export class MediaToolNotExecutable extends Data.TaggedError("MediaToolNotExecutable")<{
  readonly path: string
}> {}

export class VolumeNotMounted extends Data.TaggedError("VolumeNotMounted")<{
  readonly volumeName: string
  readonly waited: Duration.Duration
}> {}

export class VolumeNotFound extends Data.TaggedError("VolumeNotFound")<{
  readonly volumeName: string
  readonly releaseName: string
}> {}

export class MediaWriteFailed extends Data.TaggedError("MediaWriteFailed")<{
  readonly releaseName: string
  readonly exitCode: number
  readonly output: string
}> {}

export class MediaVerificationFailed extends Data.TaggedError("MediaVerificationFailed")<{
  readonly volumePath: string
  readonly items: ReadonlyArray<string>
}> {}

export type MediaError =
  | MediaToolMissing
  | MediaToolNotExecutable
  | VolumeNotMounted
  | VolumeNotFound
  | MediaWriteFailed
  | MediaVerificationFailed

// =============================================================================
// Service interface
// =============================================================================

export type MediaWriteConfig = Pick<
  RunConfig,
  "volumesRoot" | "volumeWaitTimeout" | "volumePollInterval" | "verifyRetryDelay"
>

export interface MediaService {
  /** Writes the entry's installer and returns the path of the finished volume */
  readonly write: (
    entry: PartitionPlanEntry,
    config: MediaWriteConfig,
    onLine?: ExecOptions["onLine"]
  ) => Effect.Effect<string, MediaError>
}

export class MediaServiceTag extends Context.Tag("MediaService")<MediaServiceTag, MediaService>() {}

// =============================================================================
// Helpers
// =============================================================================

const EXECUTABLE_BITS = 0o111

// Below this a volume without the usual installer items is treated as a failed write.
export const MIN_MEDIA_BYTES = 1024 * 1024 * 1024

const EXPECTED_ITEMS = [
  "Install macOS",
  "Install OS X",
  "BaseSystem.dmg",
  "InstallESD.dmg",
  "Applications",
  "System",
  "Library",
]

const IMPORTANT_KEYWORDS = ["error", "fail", "success", "complete", "done", "copying", "erasing", "creating", "warning"]

export const mediaToolPath = (applicationPath: string): string =>
  `${applicationPath}/Contents/Resources/createinstallmedia`

export const hasInstallerContent = (items: ReadonlyArray<string>): boolean => {
  const lower = items.map((item) => item.toLowerCase())
  return EXPECTED_ITEMS.some((expected) => lower.some((item) => item.includes(expected.toLowerCase())))
}

/** Lines worth showing from a tool's output: keyword hits, else the tail */
export const importantLines = (output: string): string[] => {
  const lines = output.split("\n").filter((line) => line.trim().length > 0)
  const hits = lines.filter((line) => IMPORTANT_KEYWORDS.some((kw) => line.toLowerCase().includes(kw)))
  return hits.length > 0 ? hits.slice(0, 10) : lines.slice(-5)
}

export const isKilled = (exitCode: number): boolean => exitCode === 137 || exitCode === -9

/** One-line reason for a per-volume report, with a hint where one is known */
export const describeMediaError = (error: MediaError): string => {
  switch (error._tag) {
    case "MediaToolMissing":
      return `createinstallmedia not found at ${error.path}; the installer is probably incomplete, download it again`
    case "MediaToolNotExecutable":
      return `createinstallmedia at ${error.path} is not executable; fix it with: sudo chmod +x "${error.path}"`
    case "VolumeNotMounted":
      return `${error.volumeName} was not mounted after ${Duration.toSeconds(error.waited)}s; reconnect the disk and check it in Disk Utility`
    case "VolumeNotFound":
      return `no mounted volume found for ${error.releaseName} (expected ${error.volumeName})`
    case "MediaWriteFailed":
      if (isKilled(error.exitCode)) {
        return `createinstallmedia was killed (exit ${error.exitCode}); free some memory and disk space, then try again`
      }
      return error.exitCode === 1
        ? "createinstallmedia exited with 1; the target volume was probably not mounted"
        : `createinstallmedia exited with ${error.exitCode}`
    case "MediaVerificationFailed":
      return `${error.volumePath} does not look like install media (contains: ${error.items.length > 0 ? error.items.join(", ") : "nothing"})`
  }
}

/** Tool output worth showing next to a failed volume */
export const mediaErrorOutput = (error: MediaError): string[] =>
  error._tag === "MediaWriteFailed" ? importantLines(error.output) : []

// =============================================================================
// Live implementation
// =============================================================================

export const MediaServiceLive = Layer.effect(
  MediaServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const shell = yield* ShellServiceTag
    const disks = yield* DiskServiceTag

    const exists = (path: string) => pipe(fs.exists(path), Effect.orElseSucceed(() => false))

    const listVolumes = (volumesRoot: string) =>
      pipe(
        fs.readDirectory(volumesRoot),
        Effect.map((names) => [...names].sort()),
        Effect.orElseSucceed((): string[] => [])
      )

    const isMountedVolume = (path: string) =>
      Effect.gen(function* () {
        if (!(yield* exists(path))) return false
        return yield* disks.isVolumeMounted(path)
      })

    const validateTool = (path: string): Effect.Effect<void, MediaError> =>
      Effect.gen(function* () {
        const info = yield* pipe(
          fs.stat(path),
          Effect.mapError(() => new MediaToolMissing({ path }))
        )
        if ((info.mode & EXECUTABLE_BITS) === 0) {
          return yield* Effect.fail(new MediaToolNotExecutable({ path }))
        }
      })

    const waitForVolume = (volumeName: string, config: MediaWriteConfig): Effect.Effect<void, MediaError> =>
      pipe(
        isMountedVolume(`${config.volumesRoot}/${volumeName}`),
        Effect.repeat({ schedule: Schedule.spaced(config.volumePollInterval), until: (mounted) => mounted }),
        Effect.timeoutFail({
          duration: config.volumeWaitTimeout,
          onTimeout: () => new VolumeNotMounted({ volumeName, waited: config.volumeWaitTimeout }),
        }),
        Effect.asVoid
      )

    const matchesVolume = (name: string, volumeName: string, keywords: ReadonlyArray<string>): boolean => {
      const lower = name.toLowerCase()
      return lower.includes(volumeName.toLowerCase()) || keywords.some((kw) => lower.includes(kw))
    }

    const locateVolume = (entry: PartitionPlanEntry, config: MediaWriteConfig): Effect.Effect<string, MediaError> =>
      Effect.gen(function* () {
        const expected = `${config.volumesRoot}/${entry.volumeName}`
        if (yield* isMountedVolume(expected)) return expected

        const keywords = releaseKeywords(entry.installer.releaseName)
        for (const name of yield* listVolumes(config.volumesRoot)) {
          const path = `${config.volumesRoot}/${name}`
          if (matchesVolume(name, entry.volumeName, keywords) && (yield* isMountedVolume(path))) {
            yield* Effect.logDebug(`Using ${path} for ${entry.volumeName}`)
            return path
          }
        }

        return yield* Effect.fail(
          new VolumeNotFound({ volumeName: entry.volumeName, releaseName: entry.installer.releaseName })
        )
      })

    const runTool = (
      entry: PartitionPlanEntry,
      volumePath: string,
      onLine: ExecOptions["onLine"]
    ): Effect.Effect<void, MediaError> =>
      Effect.gen(function* () {
        const releaseName = entry.installer.releaseName
        const result = yield* pipe(
          shell.exec(
            mediaToolPath(entry.installer.applicationPath),
            ["--volume", volumePath, "--applicationpath", entry.installer.applicationPath, "--nointeraction"],
            { onLine }
          ),
          Effect.mapError((e) => new MediaWriteFailed({ releaseName, exitCode: -1, output: e.message }))
        )

        const output = combinedOutput(result)
        yield* Effect.forEach(importantLines(output), (line) => Effect.logDebug(line), { discard: true })

        if (result.exitCode !== 0) {
          return yield* Effect.fail(new MediaWriteFailed({ releaseName, exitCode: result.exitCode, output }))
        }
      })

    // createinstallmedia renames the volume to "Install macOS ...".
    const findWrittenVolume = (entry: PartitionPlanEntry, volumePath: string, config: MediaWriteConfig) =>
      Effect.gen(function* () {
        const names = yield* listVolumes(config.volumesRoot)
        const exact = names.find((name) => name === `Install ${entry.installer.releaseName}`)
        const keywords = releaseKeywords(entry.installer.releaseName)
        const byKeyword = names.find((name) => matchesVolume(name, entry.volumeName, keywords))
        const found = exact ?? byKeyword
        return found === undefined ? volumePath : `${config.volumesRoot}/${found}`
      })

    const volumeBytes = (path: string): Effect.Effect<Option.Option<number>> =>
      pipe(
        shell.exec("du", ["-sk", path]),
        Effect.map((result) => (result.exitCode === 0 ? parseDuKilobytes(result.stdout) : Option.none())),
        Effect.orElseSucceed(() => Option.none<number>())
      )

    const checkContent = (path: string): Effect.Effect<string, MediaVerificationFailed> =>
      Effect.gen(function* () {
        const items = yield* pipe(
          fs.readDirectory(path),
          Effect.orElseSucceed((): string[] => [])
        )
        if (hasInstallerContent(items)) return path

        // Unusual layouts are accepted when the volume holds enough data.
        if (items.length > 0) {
          const bytes = Option.filter(yield* volumeBytes(path), (size) => size >= MIN_MEDIA_BYTES)
          if (Option.isSome(bytes)) {
            yield* Effect.logWarning(
              `${path} has none of the usual installer items but holds ${formatSize(bytes.value)}, accepting it`
            )
            return path
          }
        }

        return yield* Effect.fail(new MediaVerificationFailed({ volumePath: path, items }))
      })

    const verify = (entry: PartitionPlanEntry, volumePath: string, config: MediaWriteConfig) =>
      pipe(
        findWrittenVolume(entry, volumePath, config),
        Effect.flatMap(checkContent),
        Effect.tapError((e) => Effect.logDebug(`Verification of ${e.volumePath} failed, retrying once`)),
        Effect.retry(Schedule.addDelay(Schedule.recurs(1), () => config.verifyRetryDelay))
      )

    const write: MediaService["write"] = (entry, config, onLine) =>
      Effect.gen(function* () {
        yield* validateTool(mediaToolPath(entry.installer.applicationPath))
        yield* waitForVolume(entry.volumeName, config)
        const volumePath = yield* locateVolume(entry, config)
        yield* runTool(entry, volumePath, onLine)
        return yield* verify(entry, volumePath, config)
      })

    return { write }
  })
)
