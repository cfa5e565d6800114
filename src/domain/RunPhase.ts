/**
 * Phases of a multiboot run, in order. A run that fails before `Erase` has
 * not touched the disk; from `Erase` on, the disk may be half-prepared.
 */

import { Data } from "effect"

export const RUN_PHASES = ["Discover", "Select", "Plan", "Confirm", "Erase", "Write", "Done"] as const

export type RunPhase = (typeof RUN_PHASES)[number]

export type AbortKind = "Failed" | "Partial"

const phaseIndex = (phase: RunPhase): number => RUN_PHASES.indexOf(phase)

export const hasTouchedDisk = (phase: RunPhase): boolean => phaseIndex(phase) >= phaseIndex("Erase")

export const abortKind = (phase: RunPhase): AbortKind => (hasTouchedDisk(phase) ? "Partial" : "Failed")

export class RunAborted extends Data.TaggedError("RunAborted")<{
  readonly phase: RunPhase
  readonly error: unknown
}> {}
