import type { PartitionPlanEntry } from "./PartitionPlan"

export type MediaStatus = "succeeded" | "failed" | "skipped"

export interface MediaResult {
  readonly entry: PartitionPlanEntry
  readonly status: MediaStatus
  readonly volumePath?: string
  readonly reason?: string
  /** Notable lines from the tool when a write failed */
  readonly output?: ReadonlyArray<string>
}

export interface MediaReport {
  readonly results: ReadonlyArray<MediaResult>
  readonly succeeded: number
  readonly failed: number
  readonly skipped: number
}

const count = (results: ReadonlyArray<MediaResult>, status: MediaStatus): number =>
  results.filter((result) => result.status === status).length

export const summarize = (results: ReadonlyArray<MediaResult>): MediaReport => ({
  results,
  succeeded: count(results, "succeeded"),
  failed: count(results, "failed"),
  skipped: count(results, "skipped"),
})

export const isFullSuccess = (report: MediaReport): boolean =>
  report.results.length > 0 && report.succeeded === report.results.length
