/**
 * InstallerService - finds macOS installer applications in a directory.
 *
 * Exposes typed errors for every way the directory can be unusable. Each
 * known release contributes at most one installer, in catalog order.
 */

import { Array as Arr, Context, Data, Effect, Layer, Option, Schema, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import type { PlatformError } from "@effect/platform/Error"
import { ShellServiceTag } from "../infra/ShellService"
import { MACOS_RELEASES, matchesRelease, type InstallerRecord, type MacOSRelease } from "../domain/Installer"
import { decodePlist } from "../lib/plist"
import { parseDuKilobytes } from "../lib/parseSize"

// =============================================================================
// Service errors
// =============================================================================

export class InstallerDirNotFound extends Data.TaggedError("InstallerDirNotFound")<{
  readonly path: string
}> {}

export class InstallerDirNotADirectory extends Data.TaggedError("InstallerDirNotADirectory")<{
  readonly path: string
}> {}

export class InstallerDirPermissionDenied extends Data.TaggedError("InstallerDirPermissionDenied")<{
  readonly path: string
}> {}

export class InstallerScanFailed extends Data.TaggedError("InstallerScanFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export type InstallerError =
  | InstallerDirNotFound
  | InstallerDirNotADirectory
  | InstallerDirPermissionDenied
  | InstallerScanFailed

// =============================================================================
// Service interface
// =============================================================================

export interface InstallerService {
  readonly discover: (appDir: string) => Effect.Effect<InstallerRecord[], InstallerError>
}

export class InstallerServiceTag extends Context.Tag("InstallerService")<
  InstallerServiceTag,
  InstallerService
>() {}

// =============================================================================
// Helpers
// =============================================================================

const BundleInfo = Schema.Struct({
  CFBundleShortVersionString: Schema.optional(Schema.String),
  DTSDKBuild: Schema.optional(Schema.String),
})

const toInstallerDirError = (path: string, error: PlatformError): InstallerError => {
  if (error._tag === "SystemError") {
    if (error.reason === "NotFound") return new InstallerDirNotFound({ path })
    if (error.reason === "PermissionDenied") return new InstallerDirPermissionDenied({ path })
  }
  return new InstallerScanFailed({ path, reason: error.message })
}

// =============================================================================
// Live implementation
// =============================================================================

export const InstallerServiceLive = Layer.effect(
  InstallerServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const shell = yield* ShellServiceTag

    const bundleSize = (path: string): Effect.Effect<number, InstallerScanFailed> =>
      pipe(
        shell.exec("du", ["-sk", path]),
        Effect.mapError((e) => new InstallerScanFailed({ path, reason: e.message })),
        Effect.flatMap((result) =>
          result.exitCode === 0
            ? Option.match(parseDuKilobytes(result.stdout), {
                onNone: () => Effect.fail(new InstallerScanFailed({ path, reason: "Unreadable du output" })),
                onSome: (bytes) => Effect.succeed(bytes),
              })
            : Effect.fail(new InstallerScanFailed({ path, reason: result.stderr.trim() || `du exited with ${result.exitCode}` }))
        )
      )

    // Version metadata is informational: a bundle without it is still usable.
    const bundleInfo = (path: string) =>
      pipe(
        shell.exec("plutil", ["-convert", "xml1", "-o", "-", `${path}/Contents/Info.plist`]),
        Effect.flatMap((result) =>
          result.exitCode === 0
            ? decodePlist(BundleInfo, result.stdout, "Info.plist")
            : Effect.fail(new Error(result.stderr.trim()))
        ),
        Effect.tapError(() => Effect.logDebug(`No bundle metadata for ${path}`)),
        Effect.option
      )

    const loadInstaller = (
      appDir: string,
      entries: ReadonlyArray<string>,
      release: MacOSRelease
    ): Effect.Effect<Option.Option<InstallerRecord>, InstallerScanFailed> =>
      Effect.gen(function* () {
        const candidates = entries.filter((name) => matchesRelease(name, release)).sort()
        const fileName = candidates[0]
        if (fileName === undefined) return Option.none()

        if (candidates.length > 1) {
          yield* Effect.logWarning(`Several installers found for ${release.name}, using ${fileName}`)
        }

        const applicationPath = `${appDir}/${fileName}`
        const isDirectory = yield* pipe(
          fs.stat(applicationPath),
          Effect.map((info) => info.type === "Directory"),
          Effect.orElseSucceed(() => false)
        )
        if (!isDirectory) {
          yield* Effect.logWarning(`Skipping ${release.name}: ${applicationPath} is not an application bundle`)
          return Option.none()
        }

        const sizeBytes = yield* bundleSize(applicationPath)
        const info = yield* bundleInfo(applicationPath)

        yield* Effect.logDebug(`Found ${release.name} at ${applicationPath} (${sizeBytes} bytes)`)

        return Option.some<InstallerRecord>({
          applicationPath,
          displayName: fileName.replace(/\.app$/, ""),
          releaseName: release.name,
          version: Option.getOrUndefined(info)?.CFBundleShortVersionString,
          build: Option.getOrUndefined(info)?.DTSDKBuild,
          volumeName: release.volumeName,
          sizeBytes,
        })
      })

    const discover = (appDir: string): Effect.Effect<InstallerRecord[], InstallerError> =>
      Effect.gen(function* () {
        const info = yield* pipe(fs.stat(appDir), Effect.mapError((e) => toInstallerDirError(appDir, e)))
        if (info.type !== "Directory") {
          return yield* Effect.fail(new InstallerDirNotADirectory({ path: appDir }))
        }

        const entries = yield* pipe(
          fs.readDirectory(appDir),
          Effect.mapError((e) => toInstallerDirError(appDir, e))
        )

        const found = yield* Effect.forEach(MACOS_RELEASES, (release) => loadInstaller(appDir, entries, release))
        return Arr.getSomes(found)
      })

    return { discover }
  })
)
