/**
 * ShellService - wraps subprocess execution for testability.
 *
 * Commands run without a shell: the program and its arguments are passed as
 * they are, so volume names and paths with spaces need no quoting.
 */

import { Command, CommandExecutor } from "@effect/platform"
import { Chunk, Context, Data, Effect, Layer, Stream, pipe } from "effect"

// =============================================================================
// Errors
// =============================================================================

export class ShellError extends Data.TaggedError("ShellError")<{
  readonly message: string
  readonly command: string
  readonly notFound: boolean
}> {}

// =============================================================================
// Types
// =============================================================================

export interface ShellResult {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

export interface ExecOptions {
  /** Called for every stdout and stderr line as it arrives */
  readonly onLine?: (line: string) => Effect.Effect<void>
}

// =============================================================================
// Service interface
// =============================================================================

export interface ShellService {
  readonly exec: (
    command: string,
    args: ReadonlyArray<string>,
    options?: ExecOptions
  ) => Effect.Effect<ShellResult, ShellError>
}

export class ShellServiceTag extends Context.Tag("ShellService")<
  ShellServiceTag,
  ShellService
>() {}

export const commandLine = (command: string, args: ReadonlyArray<string>): string =>
  [command, ...args].join(" ")

/** stdout and stderr as one block, for error reports */
export const combinedOutput = (result: ShellResult): string =>
  [result.stdout, result.stderr].filter((part) => part.trim().length > 0).join("\n")

// =============================================================================
// Live implementation (@effect/platform CommandExecutor)
// =============================================================================

export const ShellServiceLive = Layer.effect(
  ShellServiceTag,
  Effect.gen(function* () {
    const executor = yield* CommandExecutor.CommandExecutor

    const exec: ShellService["exec"] = (command, args, options) =>
      pipe(
        Effect.gen(function* () {
          yield* Effect.logDebug(`$ ${commandLine(command, args)}`)

          const proc = yield* executor.start(Command.make(command, ...args))

          const collect = <E>(stream: Stream.Stream<Uint8Array, E>) =>
            pipe(
              stream,
              Stream.decodeText(),
              Stream.splitLines,
              Stream.tap((line) => (options?.onLine ? options.onLine(line) : Effect.void)),
              Stream.runCollect,
              Effect.map((lines) => Chunk.toReadonlyArray(lines).join("\n"))
            )

          const [stdout, stderr, exitCode] = yield* Effect.all(
            [collect(proc.stdout), collect(proc.stderr), proc.exitCode],
            { concurrency: "unbounded" }
          )

          return { stdout, stderr, exitCode }
        }),
        Effect.scoped,
        Effect.mapError(
          (e) =>
            new ShellError({
              message: e.message,
              command: commandLine(command, args),
              notFound: e._tag === "SystemError" && e.reason === "NotFound",
            })
        )
      )

    return { exec }
  })
)
