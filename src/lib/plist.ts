/**
 * Plist decoding for `diskutil ... -plist` and `plutil -convert xml1` output.
 */

import { Data, Effect, Schema, pipe } from "effect"
import { parse } from "fast-plist"

export class PlistParseError extends Data.TaggedError("PlistParseError")<{
  readonly source: string
  readonly reason: string
}> {}

export const parsePlist = (text: string, source: string): Effect.Effect<unknown, PlistParseError> =>
  Effect.try({
    try: (): unknown => parse(text),
    catch: (e) =>
      new PlistParseError({ source, reason: e instanceof Error ? e.message : String(e) }),
  })

export const decodePlist = <A, I>(
  schema: Schema.Schema<A, I, never>,
  text: string,
  source: string
): Effect.Effect<A, PlistParseError> =>
  pipe(
    parsePlist(text, source),
    Effect.flatMap((value) =>
      pipe(
        Schema.decodeUnknown(schema)(value),
        Effect.mapError((e) => new PlistParseError({ source, reason: e.message }))
      )
    )
  )
