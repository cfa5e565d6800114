/**
 * Everything a run needs to know, built once by the CLI and passed down.
 */

import { Duration } from "effect"
import type { AllocationStrategy } from "./PartitionPlan"
import { GPT_RESERVED_BYTES } from "./ExternalDisk"

export interface RunConfig {
  readonly appDir: string
  readonly debug: boolean
  readonly strategy: AllocationStrategy
  /** Extra room added to every installer's size */
  readonly marginBytes: number
  /** Capacity set aside for the GPT tables and EFI partition */
  readonly reservedBytes: number
  readonly maxSelectionAttempts: number
  readonly volumesRoot: string
  readonly volumeWaitTimeout: Duration.Duration
  readonly volumePollInterval: Duration.Duration
  readonly verifyRetryDelay: Duration.Duration
}

export const DEFAULT_APP_DIR = "/Applications"

export const DEFAULT_MARGIN_BYTES = 1024 * 1024 * 1024

export const defaultRunConfig: RunConfig = {
  appDir: DEFAULT_APP_DIR,
  debug: false,
  strategy: "equal",
  marginBytes: DEFAULT_MARGIN_BYTES,
  reservedBytes: GPT_RESERVED_BYTES,
  maxSelectionAttempts: 3,
  volumesRoot: "/Volumes",
  volumeWaitTimeout: Duration.seconds(60),
  volumePollInterval: Duration.millis(500),
  verifyRetryDelay: Duration.seconds(3),
}
