/**
 * macOS Multiboot CLI
 *
 * Prepares one external disk to boot several macOS installers: one
 * partition per installer found, each written with the installer's own
 * createinstallmedia tool.
 *
 * Commands:
 *   run     - Partition a disk and write every installer to it
 *   list    - Show installers and external disks, change nothing
 *   restore - Erase a disk back to a single ExFAT volume
 *
 * Example:
 *   $ sudo macos-multiboot run
 *   $ sudo macos-multiboot run --strategy minimum --margin 2GB
 *   $ macos-multiboot list --app-dir /Volumes/Stash/Installers
 */

import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Option } from "effect"

import * as Opts from "./cli/options"
import { runRun, runList, runRestore, withErrorHandling } from "./cli/handler"
import { createAppLayer } from "./core"

// =============================================================================
// Run subcommand
// =============================================================================

const runCommand = Command.make(
  "run",
  {
    debug: Opts.debug,
    appDir: Opts.appDir,
    strategy: Opts.strategy,
    margin: Opts.margin,
  },
  (opts) =>
    withErrorHandling(
      runRun({
        debug: opts.debug,
        appDir: opts.appDir,
        strategy: opts.strategy,
        margin: Option.getOrUndefined(opts.margin),
      })
    ).pipe(Effect.provide(createAppLayer()))
).pipe(
  Command.withDescription("Erase an external disk and create one install volume per macOS installer")
)

// =============================================================================
// List subcommand
// =============================================================================

const listCommand = Command.make(
  "list",
  {
    debug: Opts.debug,
    appDir: Opts.appDir,
  },
  (opts) =>
    withErrorHandling(runList({ debug: opts.debug, appDir: opts.appDir })).pipe(Effect.provide(createAppLayer()))
).pipe(
  Command.withDescription("Show the installers found and the external disks attached")
)

// =============================================================================
// Restore subcommand
// =============================================================================

const restoreCommand = Command.make(
  "restore",
  {
    debug: Opts.debug,
  },
  (opts) =>
    withErrorHandling(runRestore({ debug: opts.debug })).pipe(Effect.provide(createAppLayer()))
).pipe(
  Command.withDescription("Erase an external disk back to a single ExFAT volume")
)

// =============================================================================
// Root command
// =============================================================================

const rootCommand = Command.make("macos-multiboot", {}).pipe(
  Command.withSubcommands([runCommand, listCommand, restoreCommand]),
  Command.withDescription("Build a multiboot macOS installer disk")
)

// =============================================================================
// Run CLI
// =============================================================================

const cli = Command.run(rootCommand, {
  name: "macos-multiboot",
  version: "0.1.0",
})

NodeRuntime.runMain(cli(process.argv).pipe(Effect.provide(NodeContext.layer)), {
  disableErrorReporting: true,
})
