/**
 * In-process stand-ins for the edges of the tool: subprocesses, the
 * filesystem and the operator. Tests script what each edge answers and then
 * check what was asked of it.
 */

import { Effect, Layer, Option } from "effect"
import { FileSystem } from "@effect/platform"
import { SystemError } from "@effect/platform/Error"

import { ShellServiceTag, commandLine, type ShellResult } from "../infra/ShellService"
import { PromptServiceTag } from "../infra/PromptService"

export interface VirtualEntry {
  readonly type: "Directory" | "File"
  readonly mode: number
}

export interface ShellCall {
  readonly command: string
  readonly args: ReadonlyArray<string>
  readonly line: string
}

export type ShellHandler = (args: ReadonlyArray<string>, call: ShellCall) => ShellResult

export interface CallLog {
  shell: ShellCall[]
  prompts: string[]
}

export interface TestContext {
  calls: CallLog
  /** Answers handed out in order; when they run out the operator quits */
  answers: string[]
  addDirectory: (path: string) => void
  addFile: (path: string, options?: { mode?: number }) => void
  remove: (path: string) => void
  denyPermission: (path: string) => void
  /**
   * Scripts a command. The handler registered last for a command wins, and
   * a prefix narrows it to calls whose arguments start with that prefix.
   */
  onCommand: (command: string, prefix: ReadonlyArray<string>, handler: ShellHandler | ShellResult) => void
  layer: Layer.Layer<ShellServiceTag | PromptServiceTag | FileSystem.FileSystem>
}

export const ok = (stdout = ""): ShellResult => ({ stdout, stderr: "", exitCode: 0 })

export const failed = (exitCode: number, stderr: string, stdout = ""): ShellResult => ({ stdout, stderr, exitCode })

export const parentOf = (path: string): string => path.replace(/\/[^/]+\/?$/, "") || "/"

export function createTestContext(): TestContext {
  const entries = new Map<string, VirtualEntry>()
  const deniedPaths = new Set<string>()
  const handlers: Array<{ command: string; prefix: ReadonlyArray<string>; handler: ShellHandler }> = []

  const calls: CallLog = { shell: [], prompts: [] }
  const answers: string[] = []

  const systemError = (method: string, path: string, reason: "NotFound" | "PermissionDenied") =>
    SystemError({
      reason,
      module: "FileSystem",
      method,
      pathOrDescriptor: path,
      message: reason === "NotFound" ? "no such file or directory" : "permission denied",
    })

  const lookup = (method: string, path: string): Effect.Effect<VirtualEntry, SystemError> => {
    if (deniedPaths.has(path)) return Effect.fail(systemError(method, path, "PermissionDenied"))
    const entry = entries.get(path)
    return entry ? Effect.succeed(entry) : Effect.fail(systemError(method, path, "NotFound"))
  }

  const fileSystem = FileSystem.layerNoop({
    exists: (path) => Effect.succeed(entries.has(path)),
    stat: (path) =>
      Effect.map(lookup("stat", path), (entry) => ({
        type: entry.type,
        mtime: Option.none(),
        atime: Option.none(),
        birthtime: Option.none(),
        dev: 1,
        ino: Option.none(),
        mode: entry.mode,
        nlink: Option.none(),
        uid: Option.none(),
        gid: Option.none(),
        rdev: Option.none(),
        size: FileSystem.Size(0),
        blksize: Option.none(),
        blocks: Option.none(),
      })),
    readDirectory: (path) =>
      Effect.map(lookup("readDirectory", path), () =>
        Array.from(entries.keys())
          .filter((candidate) => candidate !== path && parentOf(candidate) === path)
          .map((candidate) => candidate.slice(path.length + 1))
      ),
  })

  const shell = Layer.succeed(ShellServiceTag, {
    exec: (command, args, options) =>
      Effect.gen(function* () {
        const call: ShellCall = { command, args, line: commandLine(command, args) }
        calls.shell.push(call)

        const match = [...handlers]
          .reverse()
          .find((h) => h.command === command && h.prefix.every((arg, i) => args[i] === arg))
        const result = match ? match.handler(args, call) : failed(127, `no script for: ${call.line}`)

        if (options?.onLine) {
          for (const line of `${result.stdout}\n${result.stderr}`.split("\n")) {
            if (line.length > 0) yield* options.onLine(line)
          }
        }
        return result
      }),
  })

  const prompt = Layer.succeed(PromptServiceTag, {
    text: (message) =>
      Effect.sync(() => {
        calls.prompts.push(message)
        return Option.fromNullable(answers.shift())
      }),
  })

  const addEntry = (path: string, entry: VirtualEntry) => {
    for (let parent = parentOf(path); !entries.has(parent); parent = parentOf(parent)) {
      entries.set(parent, { type: "Directory", mode: 0o755 })
      if (parent === "/") break
    }
    entries.set(path, entry)
  }

  return {
    calls,
    answers,

    addDirectory(path) {
      addEntry(path, { type: "Directory", mode: 0o755 })
    },

    addFile(path, options) {
      addEntry(path, { type: "File", mode: options?.mode ?? 0o644 })
    },

    remove(path) {
      for (const candidate of Array.from(entries.keys())) {
        if (candidate === path || candidate.startsWith(`${path}/`)) entries.delete(candidate)
      }
    },

    denyPermission(path) {
      deniedPaths.add(path)
    },

    onCommand(command, prefix, handler) {
      handlers.push({ command, prefix, handler: typeof handler === "function" ? handler : () => handler })
    },

    layer: Layer.mergeAll(shell, prompt, fileSystem),
  }
}
