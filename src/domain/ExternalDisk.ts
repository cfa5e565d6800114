import { formatSize } from "../lib/parseSize"

export interface ExternalDisk {
  readonly deviceIdentifier: string
  readonly deviceNode: string
  readonly mediaName: string
  readonly sizeBytes: number
  readonly mounted: boolean
  readonly internal: boolean
}

// GPT keeps room for its EFI system partition and tables.
export const GPT_RESERVED_BYTES = 200 * 1024 * 1024

export const usableCapacity = (disk: ExternalDisk, reservedBytes: number): number =>
  Math.max(0, disk.sizeBytes - reservedBytes)

export const describeDisk = (disk: ExternalDisk): string =>
  `${disk.mediaName} (${formatSize(disk.sizeBytes)})${disk.mounted ? " (mounted)" : ""}`
