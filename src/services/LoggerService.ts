/**
 * LoggerService - formatted console output for run, list, and restore commands
 */

import { Context, Effect, Layer, Console } from "effect"
import type { InstallerRecord } from "../domain/Installer"
import { describeInstaller, minimumPartitionBytes } from "../domain/Installer"
import type { ExternalDisk } from "../domain/ExternalDisk"
import { describeDisk } from "../domain/ExternalDisk"
import type { PartitionPlan, PartitionPlanEntry } from "../domain/PartitionPlan"
import type { MediaReport } from "../domain/MediaReport"
import { formatSize } from "../lib/parseSize"

// =============================================================================
// Service interface
// =============================================================================

export interface LoggerService {
  readonly common: {
    readonly searchingInstallers: (appDir: string) => Effect.Effect<void>
    readonly installerFound: (installer: InstallerRecord) => Effect.Effect<void>
    readonly noInstallersFound: (appDir: string) => Effect.Effect<void>
    readonly sizeSummary: (installers: ReadonlyArray<InstallerRecord>, marginBytes: number) => Effect.Effect<void>
    readonly searchingDisks: Effect.Effect<void>
    readonly diskList: (disks: ReadonlyArray<ExternalDisk>) => Effect.Effect<void>
    readonly invalidChoice: (max: number) => Effect.Effect<void>
    readonly diskSelected: (disk: ExternalDisk) => Effect.Effect<void>
    readonly cancelled: Effect.Effect<void>
    readonly unmounting: (disk: ExternalDisk) => Effect.Effect<void>
    readonly progress: (label: string, percent: number) => Effect.Effect<void>
  }
  readonly run: {
    readonly header: Effect.Effect<void>
    readonly planSummary: (plan: PartitionPlan) => Effect.Effect<void>
    readonly internalDiskWarning: (disk: ExternalDisk) => Effect.Effect<void>
    readonly eraseWarning: (disk: ExternalDisk, plan: PartitionPlan) => Effect.Effect<void>
    readonly partitioning: (disk: ExternalDisk) => Effect.Effect<void>
    readonly partitioned: Effect.Effect<void>
    readonly writingMedia: (count: number) => Effect.Effect<void>
    readonly writingEntry: (entry: PartitionPlanEntry, position: number, total: number) => Effect.Effect<void>
    readonly entrySucceeded: (entry: PartitionPlanEntry, volumePath: string) => Effect.Effect<void>
    readonly entryFailed: (
      entry: PartitionPlanEntry,
      reason: string,
      output: ReadonlyArray<string>
    ) => Effect.Effect<void>
    readonly diskGone: (disk: ExternalDisk, remaining: number) => Effect.Effect<void>
    readonly report: (report: MediaReport) => Effect.Effect<void>
  }
  readonly list: {
    readonly header: Effect.Effect<void>
    readonly noDisksFound: Effect.Effect<void>
  }
  readonly restore: {
    readonly header: Effect.Effect<void>
    readonly eraseWarning: (disk: ExternalDisk) => Effect.Effect<void>
    readonly restoring: (disk: ExternalDisk) => Effect.Effect<void>
    readonly restored: (disk: ExternalDisk) => Effect.Effect<void>
    readonly manualCommand: (disk: ExternalDisk) => Effect.Effect<void>
  }
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

const STATUS_ICONS = { succeeded: "✓", failed: "✗", skipped: "–" } as const

// =============================================================================
// Implementation
// =============================================================================

export const LoggerServiceLive = Layer.succeed(
  LoggerServiceTag,
  {
    common: {
      searchingInstallers: (appDir) => Console.log(`🔍 Searching for installers in ${appDir}...`),
      installerFound: (installer) => Console.log(`   ✓ ${describeInstaller(installer)}`),
      noInstallersFound: (appDir) =>
        Effect.gen(function* () {
          yield* Console.error(`\n❌ No macOS installers found in ${appDir}`)
          yield* Console.error("   Download installers from the App Store, with Mist,")
          yield* Console.error("   or with: softwareupdate --fetch-full-installer --full-installer-version <version>\n")
        }),
      sizeSummary: (installers, marginBytes) =>
        Effect.gen(function* () {
          yield* Console.log(`\n📊 Installer sizes (margin ${formatSize(marginBytes)} each):`)
          for (const installer of installers) {
            yield* Console.log(
              `   ${installer.releaseName}: ${formatSize(installer.sizeBytes)} → ${formatSize(minimumPartitionBytes(installer, marginBytes))}`
            )
          }
          const total = installers.reduce((acc, installer) => acc + minimumPartitionBytes(installer, marginBytes), 0)
          yield* Console.log(`   Total space needed: ${formatSize(total)}`)
        }),
      searchingDisks: Console.log("\n🔍 Searching for external disks..."),
      diskList: (disks) =>
        Effect.gen(function* () {
          yield* Console.log("\nAvailable disks:")
          for (const [index, disk] of disks.entries()) {
            yield* Console.log(`   [${index + 1}] ${disk.deviceNode} - ${describeDisk(disk)}`)
          }
        }),
      invalidChoice: (max) => Console.error(`❌ Invalid choice. Enter a number between 1 and ${max}.`),
      diskSelected: (disk) => Console.log(`\n→ Selected ${disk.deviceNode} (${describeDisk(disk)})`),
      cancelled: Console.log("\nCancelled. Nothing was changed.\n"),
      unmounting: (disk) => Console.log(`\n⏏️  Unmounting ${disk.deviceNode}...`),
      progress: (label, percent) => Console.log(`   [${String(percent).padStart(3)}%] ${label}`),
    },
    run: {
      header: Console.log("\n💽 macOS Multiboot - Run\n"),
      planSummary: (plan) =>
        Effect.gen(function* () {
          yield* Console.log(`\n📋 Partition plan (${plan.strategy}, ${formatSize(plan.capacityBytes)} usable):`)
          for (const entry of plan.entries) {
            const size = entry.takesRemainder ? `${formatSize(entry.sizeBytes)} (rest of disk)` : formatSize(entry.sizeBytes)
            yield* Console.log(`   ${entry.index + 1}. ${entry.volumeName}: ${size}, needs ${formatSize(entry.minimumBytes)}`)
          }
        }),
      internalDiskWarning: (disk) =>
        Effect.gen(function* () {
          yield* Console.log(`\n⚠️  ${disk.deviceNode} reports itself as an INTERNAL disk.`)
          yield* Console.log("   Erasing it may destroy your system or your data.")
        }),
      eraseWarning: (disk, plan) =>
        Effect.gen(function* () {
          yield* Console.log(`\n⚠️  ALL DATA on ${disk.deviceNode} (${describeDisk(disk)}) will be erased.`)
          yield* Console.log(`   ${plan.entries.length} partitions will be created.`)
        }),
      partitioning: (disk) => Console.log(`\n🧱 Partitioning ${disk.deviceNode}...`),
      partitioned: Console.log("✓ Disk partitioned"),
      writingMedia: (count) =>
        Effect.gen(function* () {
          yield* Console.log(`\n📀 Creating ${count} install volumes`)
          yield* Console.log("   Each one can take 10 to 30 minutes.")
        }),
      writingEntry: (entry, position, total) =>
        Console.log(`\n[${position}/${total}] ${describeInstaller(entry.installer)} → ${entry.volumeName}`),
      entrySucceeded: (entry, volumePath) => Console.log(`✓ ${entry.installer.releaseName} ready at ${volumePath}`),
      entryFailed: (entry, reason, output) =>
        Effect.gen(function* () {
          yield* Console.error(`✗ ${entry.installer.releaseName} failed: ${reason}`)
          for (const line of output) yield* Console.error(`     | ${line}`)
        }),
      diskGone: (disk, remaining) =>
        Console.error(`\n❌ ${disk.deviceNode} is no longer available; skipping ${remaining} remaining volume(s)`),
      report: (report) =>
        Effect.gen(function* () {
          yield* Console.log("\n📊 Summary:")
          for (const result of report.results) {
            const detail = result.status === "succeeded" ? result.volumePath ?? "" : result.reason ?? ""
            yield* Console.log(`   ${STATUS_ICONS[result.status]} ${result.entry.volumeName}: ${result.status}${detail ? ` (${detail})` : ""}`)
          }
          yield* Console.log(`   Succeeded: ${report.succeeded}, failed: ${report.failed}, skipped: ${report.skipped}\n`)
        }),
    },
    list: {
      header: Console.log("\n💽 macOS Multiboot - List\n"),
      noDisksFound: Console.log("\nNo external disks found."),
    },
    restore: {
      header: Console.log("\n💽 macOS Multiboot - Restore\n"),
      eraseWarning: (disk) =>
        Effect.gen(function* () {
          yield* Console.log(`\n⚠️  ALL DATA on ${disk.deviceNode} (${describeDisk(disk)}) will be erased.`)
          yield* Console.log("   The disk will be reformatted as a single ExFAT volume named USB_DISK.")
        }),
      restoring: (disk) => Console.log(`\n🧹 Erasing ${disk.deviceNode}...`),
      restored: (disk) => Console.log(`✓ ${disk.deviceNode} restored as USB_DISK (ExFAT)\n`),
      manualCommand: (disk) =>
        Console.error(`   To restore it by hand: sudo diskutil eraseDisk ExFAT USB_DISK ${disk.deviceNode}`),
    },
  }
)
