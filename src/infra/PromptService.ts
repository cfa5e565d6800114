/**
 * PromptService - reads operator answers from the terminal.
 *
 * Quitting a prompt (Ctrl+C, Esc) is not an error: it comes back as None so
 * callers can treat it as a cancellation.
 */

import { Prompt } from "@effect/cli"
import { Terminal } from "@effect/platform"
import { Context, Effect, Layer, type Option } from "effect"

export interface PromptService {
  readonly text: (message: string) => Effect.Effect<Option.Option<string>>
}

export class PromptServiceTag extends Context.Tag("PromptService")<
  PromptServiceTag,
  PromptService
>() {}

export const PromptServiceLive = Layer.effect(
  PromptServiceTag,
  Effect.gen(function* () {
    const terminal = yield* Terminal.Terminal

    return {
      text: (message) =>
        Prompt.text({ message }).pipe(
          Effect.provideService(Terminal.Terminal, terminal),
          Effect.option
        ),
    }
  })
)
