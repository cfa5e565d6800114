/**
 * Partition planning: one partition per installer, sized by a
 * configurable allocation strategy.
 *
 * - `equal`: every partition gets the same share of the capacity. Valid only
 *   when that share covers every installer's minimum.
 * - `minimum`: every partition but the last gets exactly its minimum, the
 *   last one takes what is left.
 *
 * Either way the last partition is flagged `takesRemainder` so the partition
 * tool hands it any rounding slack.
 */

import { Data, Effect } from "effect"
import { minimumPartitionBytes, type InstallerRecord } from "./Installer"

export const ALLOCATION_STRATEGIES = ["equal", "minimum"] as const

export type AllocationStrategy = (typeof ALLOCATION_STRATEGIES)[number]

export interface PartitionPlanEntry {
  readonly index: number
  readonly installer: InstallerRecord
  readonly sizeBytes: number
  readonly minimumBytes: number
  readonly takesRemainder: boolean
  readonly volumeName: string
}

export interface PartitionPlan {
  readonly strategy: AllocationStrategy
  readonly capacityBytes: number
  readonly entries: readonly PartitionPlanEntry[]
  readonly totalBytes: number
}

export interface PlanOptions {
  readonly strategy: AllocationStrategy
  readonly marginBytes: number
}

// =============================================================================
// Errors
// =============================================================================

export class InsufficientCapacity extends Data.TaggedError("InsufficientCapacity")<{
  readonly strategy: AllocationStrategy
  readonly requiredBytes: number
  readonly availableBytes: number
  readonly shortfallBytes: number
}> {}

export class NothingToPlan extends Data.TaggedError("NothingToPlan")<{}> {}

export type PlanError = InsufficientCapacity | NothingToPlan

// =============================================================================
// Strategies
// =============================================================================

type Allocator = (
  minimums: readonly number[],
  capacityBytes: number
) => Effect.Effect<number[], InsufficientCapacity>

const shortfall = (
  strategy: AllocationStrategy,
  requiredBytes: number,
  availableBytes: number
): InsufficientCapacity =>
  new InsufficientCapacity({
    strategy,
    requiredBytes,
    availableBytes,
    shortfallBytes: requiredBytes - availableBytes,
  })

const allocateEqual: Allocator = (minimums, capacityBytes) => {
  const share = Math.floor(capacityBytes / minimums.length)
  const largest = Math.max(...minimums)

  return share < largest
    ? Effect.fail(shortfall("equal", largest * minimums.length, capacityBytes))
    : Effect.succeed(minimums.map(() => share))
}

const allocateMinimum: Allocator = (minimums, capacityBytes) => {
  const required = minimums.reduce((acc, bytes) => acc + bytes, 0)
  if (required > capacityBytes) {
    return Effect.fail(shortfall("minimum", required, capacityBytes))
  }

  const fixed = minimums.slice(0, -1)
  const fixedTotal = fixed.reduce((acc, bytes) => acc + bytes, 0)
  return Effect.succeed([...fixed, capacityBytes - fixedTotal])
}

const allocators: Record<AllocationStrategy, Allocator> = {
  equal: allocateEqual,
  minimum: allocateMinimum,
}

// =============================================================================
// Planner
// =============================================================================

export const planPartitions = (
  installers: readonly InstallerRecord[],
  capacityBytes: number,
  options: PlanOptions
): Effect.Effect<PartitionPlan, PlanError> =>
  Effect.gen(function* () {
    if (installers.length === 0) {
      return yield* Effect.fail(new NothingToPlan())
    }

    const minimums = installers.map((installer) => minimumPartitionBytes(installer, options.marginBytes))
    const sizes = yield* allocators[options.strategy](minimums, capacityBytes)

    const entries = installers.map((installer, index): PartitionPlanEntry => ({
      index,
      installer,
      sizeBytes: sizes[index] ?? 0,
      minimumBytes: minimums[index] ?? 0,
      takesRemainder: index === installers.length - 1,
      volumeName: installer.volumeName,
    }))

    yield* Effect.logDebug(
      `Planned ${entries.length} partitions (${options.strategy}) on ${capacityBytes} bytes: ${sizes.join(", ")}`
    )

    return {
      strategy: options.strategy,
      capacityBytes,
      entries,
      totalBytes: sizes.reduce((acc, bytes) => acc + bytes, 0),
    }
  })
