import { Console, Data, Effect, Logger, LogLevel, pipe } from "effect";

import type { ListOptions, RestoreOptions, RunOptions } from "./options";
import { toRunConfig } from "./optionParsing";
import { NotRunningAsRoot, fromDomainError } from "./errors";
import { listAvailable, prepareMultibootDisk, restoreExternalDisk } from "../core";
import { isFullSuccess } from "../domain/MediaReport";
import type { RunConfig } from "../domain/RunConfig";

/**
 * Failure that only sets the exit code: whatever explains it has already
 * been printed.
 */
export class ExitWithFailure extends Data.TaggedError("ExitWithFailure")<{}> {}

/**
 * Error handling wrapper for CLI commands
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<A, ExitWithFailure, R> =>
  pipe(
    effect,
    Effect.catchAll((error) =>
      error instanceof ExitWithFailure
        ? Effect.fail(error)
        : pipe(
            Console.error(`\n${fromDomainError(error).format()}\n`),
            Effect.zipRight(Effect.fail(new ExitWithFailure()))
          )
    )
  );

export const requireRoot = (command: string): Effect.Effect<void, NotRunningAsRoot> =>
  Effect.suspend(() =>
    process.getuid?.() === 0 ? Effect.void : Effect.fail(new NotRunningAsRoot({ command }))
  );

/** Debug logs show only when the run config asks for them */
export const withConfigLogLevel = (config: Pick<RunConfig, "debug">) =>
  Logger.withMinimumLogLevel(config.debug ? LogLevel.Debug : LogLevel.Info);

/**
 * Run the run command
 */
export const runRun = (options: RunOptions) =>
  Effect.gen(function* () {
    yield* requireRoot("run");
    const config = yield* toRunConfig(options);

    const outcome = yield* pipe(
      Effect.logDebug(`Config: appDir=${config.appDir}, strategy=${config.strategy}, margin=${config.marginBytes}`),
      Effect.zipRight(prepareMultibootDisk(config)),
      withConfigLogLevel(config)
    );

    switch (outcome._tag) {
      case "NoInstallers":
        return yield* Effect.fail(new ExitWithFailure());
      case "Cancelled":
        return;
      case "Completed":
        if (!isFullSuccess(outcome.report)) {
          return yield* Effect.fail(new ExitWithFailure());
        }
    }
  });

/**
 * Run the list command
 */
export const runList = (options: ListOptions) =>
  Effect.gen(function* () {
    const config = yield* toRunConfig(options);
    yield* pipe(listAvailable(config), withConfigLogLevel(config));
  });

/**
 * Run the restore command
 */
export const runRestore = (options: RestoreOptions) =>
  Effect.gen(function* () {
    yield* requireRoot("restore");
    const config = yield* toRunConfig(options);
    yield* pipe(restoreExternalDisk(config), withConfigLogLevel(config));
  });
