/**
 * Human-readable sizes.
 *
 * Supports raw bytes ("1024") and binary units with optional "B"/"iB"
 * suffixes ("512M", "20GB", "1.5TiB"). Case-insensitive, spaces optional.
 *
 * @example
 *   parseSize("512MB") // 536870912
 *   parseSize("20GB")  // 21474836480
 */

import { Data, Effect, Option } from "effect"

export class InvalidSize extends Data.TaggedError("InvalidSize")<{
  readonly input: string
  readonly reason: string
}> {}

const KIB = 1024
const MIB = KIB * 1024
const GIB = MIB * 1024
const TIB = GIB * 1024

const UNITS: Record<string, number> = {
  b: 1,
  k: KIB,
  kb: KIB,
  kib: KIB,
  m: MIB,
  mb: MIB,
  mib: MIB,
  g: GIB,
  gb: GIB,
  gib: GIB,
  t: TIB,
  tb: TIB,
  tib: TIB,
}

export const parseSize = (input: string): Effect.Effect<number, InvalidSize> => {
  const trimmed = input.trim().toLowerCase()

  if (/^\d+$/.test(trimmed)) {
    return Effect.succeed(parseInt(trimmed, 10))
  }

  const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*([a-z]+)$/)
  const numStr = match?.[1]
  const unit = match?.[2]

  if (!numStr || !unit) {
    return Effect.fail(
      new InvalidSize({ input, reason: "Use formats like: 512MB, 1GB, 1.5TB" })
    )
  }

  const multiplier = UNITS[unit]

  if (multiplier === undefined) {
    return Effect.fail(new InvalidSize({ input, reason: `Unknown unit "${unit}". Use: B, KB, MB, GB, TB` }))
  }

  return Effect.succeed(Math.floor(parseFloat(numStr) * multiplier))
}

export const formatSize = (bytes: number): string => {
  const absBytes = Math.abs(bytes)
  const sign = bytes < 0 ? "-" : ""

  if (absBytes < KIB) return `${sign}${absBytes} B`
  if (absBytes < MIB) return `${sign}${(absBytes / KIB).toFixed(1)} KB`
  if (absBytes < GIB) return `${sign}${(absBytes / MIB).toFixed(1)} MB`
  if (absBytes < TIB) return `${sign}${(absBytes / GIB).toFixed(2)} GB`
  return `${sign}${(absBytes / TIB).toFixed(2)} TB`
}

/** First field of `du -sk` output, in bytes */
export const parseDuKilobytes = (stdout: string): Option.Option<number> => {
  const match = stdout.trim().match(/^(\d+)/)
  return match?.[1] ? Option.some(parseInt(match[1], 10) * 1024) : Option.none()
}
