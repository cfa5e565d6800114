import { Data, Match } from "effect";

import type { InstallerError } from "../services/InstallerService";
import type { DiskError } from "../services/DiskService";
import type { ShellError } from "../infra/ShellService";
import type { PlanError } from "../domain/PartitionPlan";
import type { SelectionError } from "../core/selectDisk";
import type { RunAborted } from "../domain/RunPhase";
import { abortKind } from "../domain/RunPhase";
import type { InvalidSize } from "../lib/parseSize";
import { formatSize } from "../lib/parseSize";
import type { PlistParseError } from "../lib/plist";

export class NotRunningAsRoot extends Data.TaggedError("NotRunningAsRoot")<{
  readonly command: string;
}> {}

type DomainError =
  | InstallerError
  | DiskError
  | PlanError
  | SelectionError
  | ShellError
  | InvalidSize
  | PlistParseError
  | NotRunningAsRoot
  | RunAborted;

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const MAX_OUTPUT_LINES = 20;

/** Tool output indented under the detail line, last lines only */
export const withOutput = (message: string, output: string): string => {
  const lines = output.split("\n").filter((line) => line.trim().length > 0);
  if (lines.length === 0) return message;
  const shown = lines.slice(-MAX_OUTPUT_LINES).map((line) => `     | ${line}`);
  return [message, "", "   Tool output:", ...shown].join("\n");
};

const errors = {
  notRoot: (command: string) =>
    new AppError(
      "Root privileges required",
      `The '${command}' command erases disks and must run as root.`,
      `Re-run it with sudo: sudo macos-multiboot ${command}`
    ),

  installerDirNotFound: (path: string) =>
    new AppError(
      "Installer directory not found",
      `The directory "${path}" does not exist.`,
      `Check the path, or pass the folder holding your installers with --app-dir.`
    ),

  installerDirNotADirectory: (path: string) =>
    new AppError(
      "Not a directory",
      `The path "${path}" exists but is not a directory.`,
      `Pass the folder that contains the "Install macOS ....app" bundles with --app-dir.`
    ),

  installerDirPermissionDenied: (path: string) =>
    new AppError(
      "Permission denied",
      `Cannot read the installer directory "${path}": permission denied.`,
      `Run the command with sudo, or grant Full Disk Access to your terminal.`
    ),

  installerScanFailed: (path: string, reason: string) =>
    new AppError(
      "Installer scan failed",
      `Could not inspect "${path}": ${reason}`,
      `Check that the installer is complete. Re-download it if it was interrupted.`
    ),

  diskutilUnavailable: (reason: string) =>
    new AppError(
      "diskutil unavailable",
      reason,
      `This tool only runs on macOS, where diskutil is part of the system.`
    ),

  diskListFailed: (reason: string) =>
    new AppError(
      "Cannot list disks",
      `diskutil could not list the attached disks: ${reason}`,
      `Run 'diskutil list' yourself to see what is wrong.`
    ),

  diskInfoUnavailable: (device: string, reason: string) =>
    new AppError(
      "Cannot read disk information",
      `diskutil could not describe ${device}: ${reason}`,
      `Check that the disk is still connected.`
    ),

  diskBusy: (device: string, output: string, processName?: string, processId?: string) =>
    new AppError(
      "Disk in use",
      withOutput(
        processName && processId
          ? `${device} cannot be unmounted: it is in use by ${processName} (PID ${processId}).`
          : `${device} cannot be unmounted: it is in use.`,
        output
      ),
      [
        `Close Finder windows and apps showing files on the disk,`,
        `eject its volumes from Finder,`,
        processId ? `or stop the process with: sudo kill ${processId}.` : `or wait for Spotlight or Time Machine to finish.`,
        `Then run the command again.`
      ].join(" ")
    ),

  partitionFailed: (device: string, exitCode: number, output: string) =>
    new AppError(
      "Partitioning failed",
      withOutput(`diskutil partitionDisk ${device} exited with ${exitCode}.`, output),
      `Check the disk in Disk Utility. Faulty disks or hubs often fail here.`
    ),

  restoreFailed: (device: string, exitCode: number, output: string) =>
    new AppError(
      "Restore failed",
      withOutput(`diskutil eraseDisk ${device} exited with ${exitCode}.`, output),
      `Restore it by hand: sudo diskutil eraseDisk ExFAT USB_DISK ${device}`
    ),

  insufficientCapacity: (requiredBytes: number, availableBytes: number, shortfallBytes: number) =>
    new AppError(
      "Disk too small",
      `The partitions need ${formatSize(requiredBytes)} but the disk offers ${formatSize(availableBytes)} (${formatSize(shortfallBytes)} short).`,
      `Use a larger disk, remove an installer from the directory, lower --margin, or try --strategy minimum.`
    ),

  nothingToPlan: () =>
    new AppError(
      "Nothing to partition",
      `No installers were given to the partition planner.`,
      `Add installers to the installer directory and try again.`
    ),

  noExternalDisks: () =>
    new AppError(
      "No external disk found",
      `No ejectable, external whole disk is attached.`,
      `Connect a USB disk and check that it appears in 'diskutil list external'.`
    ),

  selectionAttemptsExceeded: (attempts: number) =>
    new AppError(
      "No disk selected",
      `No valid disk number was entered after ${attempts} attempts.`,
      `Run the command again and enter the number shown next to the disk.`
    ),

  commandFailed: (command: string, message: string) =>
    new AppError(
      "Command failed",
      `Could not run "${command}": ${message}`,
      `Check that the tool exists and that you are running on macOS.`
    ),

  invalidSize: (input: string, reason: string) =>
    new AppError("Invalid size", `"${input}" is not a size. ${reason}`, `Use formats like: 512MB, 1GB, 1.5TB`),

  unreadableToolOutput: (source: string, reason: string) =>
    new AppError(
      "Unreadable tool output",
      `Could not read the output of ${source}: ${reason}`,
      `Run with --debug to see the raw output.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`),

  permissionDenied: (message: string) =>
    new AppError(
      "Permission denied",
      message,
      `Check that you have the required permissions. You may need to run with sudo.`
    )
};

const PARTIAL_WARNING =
  "The disk may be half-prepared and is not rolled back. Run 'sudo macos-multiboot restore' to reset it.";

const partial = (error: AppError): AppError =>
  new AppError(error.title, `${error.detail}\n\n   WARNING: ${PARTIAL_WARNING}`, error.suggestion);

const matchDomainError: (error: DomainError) => AppError = Match.typeTags<DomainError>()({
  NotRunningAsRoot: (e) => errors.notRoot(e.command),

  InstallerDirNotFound: (e) => errors.installerDirNotFound(e.path),
  InstallerDirNotADirectory: (e) => errors.installerDirNotADirectory(e.path),
  InstallerDirPermissionDenied: (e) => errors.installerDirPermissionDenied(e.path),
  InstallerScanFailed: (e) => errors.installerScanFailed(e.path, e.reason),

  DiskutilUnavailable: (e) => errors.diskutilUnavailable(e.reason),
  DiskListFailed: (e) => errors.diskListFailed(e.reason),
  DiskInfoUnavailable: (e) => errors.diskInfoUnavailable(e.device, e.reason),
  DiskBusy: (e) => errors.diskBusy(e.device, e.output, e.processName, e.processId),
  PartitionFailed: (e) => errors.partitionFailed(e.device, e.exitCode, e.output),
  RestoreFailed: (e) => errors.restoreFailed(e.device, e.exitCode, e.output),

  InsufficientCapacity: (e) => errors.insufficientCapacity(e.requiredBytes, e.availableBytes, e.shortfallBytes),
  NothingToPlan: () => errors.nothingToPlan(),

  NoExternalDisks: () => errors.noExternalDisks(),
  SelectionAttemptsExceeded: (e) => errors.selectionAttemptsExceeded(e.attempts),

  ShellError: (e) => errors.commandFailed(e.command, e.message),
  InvalidSize: (e) => errors.invalidSize(e.input, e.reason),
  PlistParseError: (e) => errors.unreadableToolOutput(e.source, e.reason),

  RunAborted: (e) => {
    const inner = fromDomainError(e.error);
    return abortKind(e.phase) === "Partial" ? partial(inner) : inner;
  }
});

const DOMAIN_TAGS: ReadonlySet<string> = new Set([
  "NotRunningAsRoot",
  "InstallerDirNotFound",
  "InstallerDirNotADirectory",
  "InstallerDirPermissionDenied",
  "InstallerScanFailed",
  "DiskutilUnavailable",
  "DiskListFailed",
  "DiskInfoUnavailable",
  "DiskBusy",
  "PartitionFailed",
  "RestoreFailed",
  "InsufficientCapacity",
  "NothingToPlan",
  "NoExternalDisks",
  "SelectionAttemptsExceeded",
  "ShellError",
  "InvalidSize",
  "PlistParseError",
  "RunAborted"
]);

const isDomainError = (e: unknown): e is DomainError =>
  typeof e === "object" &&
  e !== null &&
  "_tag" in e &&
  typeof e._tag === "string" &&
  DOMAIN_TAGS.has(e._tag);

const isPermissionError = (message: string): boolean =>
  message.toLowerCase().includes("permission denied") ||
  message.toLowerCase().includes("eacces") ||
  message.toLowerCase().includes("operation not permitted") ||
  message.toLowerCase().includes("eperm");

export function fromDomainError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (isDomainError(error)) {
    return matchDomainError(error);
  }

  if (error instanceof Error) {
    return isPermissionError(error.message)
      ? errors.permissionDenied(error.message)
      : errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
}

