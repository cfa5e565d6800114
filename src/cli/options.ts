import { Options } from "@effect/cli";
import { ALLOCATION_STRATEGIES } from "../domain/PartitionPlan";
import { DEFAULT_APP_DIR } from "../domain/RunConfig";

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Show diagnostic logs, including raw tool output")
);

export const appDir = Options.text("app-dir").pipe(
  Options.withDescription("Directory holding the macOS installer applications"),
  Options.withDefault(DEFAULT_APP_DIR)
);

export const strategy = Options.choice("strategy", ALLOCATION_STRATEGIES).pipe(
  Options.withDescription(
    "How to size partitions: 'equal' shares the disk evenly, 'minimum' gives each installer what it needs and the rest to the last one"
  ),
  Options.withDefault("equal" as const)
);

export const margin = Options.text("margin").pipe(
  Options.withDescription("Extra space per partition on top of the installer size (e.g., 512MB, 2GB). Default: 1GB"),
  Options.optional
);

export interface RunOptions {
  readonly debug: boolean;
  readonly appDir: string;
  readonly strategy: (typeof ALLOCATION_STRATEGIES)[number];
  readonly margin?: string;
}

export interface ListOptions {
  readonly debug: boolean;
  readonly appDir: string;
}

export interface RestoreOptions {
  readonly debug: boolean;
}
