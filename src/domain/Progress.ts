/**
 * Keyword-based progress tracking for tools that print free-form status
 * lines (diskutil, createinstallmedia).
 *
 * Rules are checked in order and the first keyword found in a line wins,
 * so more specific keywords go first ("unmounting" before "mount").
 */

import { Option } from "effect"

export interface ProgressRule {
  readonly keyword: string
  readonly percent: number
  readonly label: string
}

export const PARTITION_PROGRESS: ReadonlyArray<ProgressRule> = [
  { keyword: "finished", percent: 100, label: "Done" },
  { keyword: "complete", percent: 100, label: "Done" },
  { keyword: "unmounting", percent: 10, label: "Unmounting disk" },
  { keyword: "unmount", percent: 10, label: "Unmounting disk" },
  { keyword: "creating partition", percent: 20, label: "Creating partition table" },
  { keyword: "partition map", percent: 20, label: "Creating partition table" },
  { keyword: "waiting for partitions to activate", percent: 40, label: "Waiting for partitions" },
  { keyword: "formatting", percent: 60, label: "Formatting partitions" },
  { keyword: "mounting", percent: 80, label: "Mounting volumes" },
  { keyword: "mount", percent: 80, label: "Mounting volumes" },
]

export const MEDIA_PROGRESS: ReadonlyArray<ProgressRule> = [
  { keyword: "install media now available", percent: 100, label: "Done" },
  { keyword: "complete", percent: 100, label: "Done" },
  { keyword: "success", percent: 100, label: "Done" },
  { keyword: "copying boot files", percent: 90, label: "Copying boot files" },
  { keyword: "making disk bootable", percent: 85, label: "Making disk bootable" },
  { keyword: "packages", percent: 75, label: "Installing packages" },
  { keyword: "base system", percent: 60, label: "Installing base system" },
  { keyword: "basesystem", percent: 60, label: "Installing base system" },
  { keyword: "installing", percent: 40, label: "Installing" },
  { keyword: "copying", percent: 20, label: "Copying installer files" },
  { keyword: "erasing", percent: 5, label: "Erasing volume" },
  { keyword: "formatting", percent: 5, label: "Erasing volume" },
]

export const RESTORE_PROGRESS: ReadonlyArray<ProgressRule> = [
  { keyword: "finished", percent: 100, label: "Done" },
  { keyword: "complete", percent: 100, label: "Done" },
  { keyword: "unmounting", percent: 10, label: "Unmounting disk" },
  { keyword: "unmount", percent: 10, label: "Unmounting disk" },
  { keyword: "erasing", percent: 20, label: "Erasing disk" },
  { keyword: "erase", percent: 20, label: "Erasing disk" },
  { keyword: "creating", percent: 30, label: "Creating partition" },
  { keyword: "formatting", percent: 60, label: "Formatting disk" },
  { keyword: "mounting", percent: 80, label: "Mounting volume" },
  { keyword: "mount", percent: 80, label: "Mounting volume" },
]

export const matchProgress = (
  rules: ReadonlyArray<ProgressRule>,
  line: string
): Option.Option<ProgressRule> => {
  const lower = line.toLowerCase()
  return Option.fromNullable(rules.find((rule) => lower.includes(rule.keyword)))
}

/**
 * The rule a line moves progress to, if it moves it forward at all.
 */
export const advanceProgress = (
  rules: ReadonlyArray<ProgressRule>,
  currentPercent: number,
  line: string
): Option.Option<ProgressRule> =>
  Option.filter(matchProgress(rules, line), (rule) => rule.percent > currentPercent)
