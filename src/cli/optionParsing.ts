import { Effect } from "effect";
import { parseSize, type InvalidSize } from "../lib/parseSize";
import { DEFAULT_MARGIN_BYTES, defaultRunConfig, type RunConfig } from "../domain/RunConfig";
import type { RunOptions } from "./options";

export const parseMargin = (margin: string | undefined): Effect.Effect<number, InvalidSize> =>
  margin === undefined ? Effect.succeed(DEFAULT_MARGIN_BYTES) : parseSize(margin);

export const toRunConfig = (options: Partial<RunOptions>): Effect.Effect<RunConfig, InvalidSize> =>
  Effect.gen(function* () {
    const marginBytes = yield* parseMargin(options.margin);

    return {
      ...defaultRunConfig,
      appDir: options.appDir ?? defaultRunConfig.appDir,
      debug: options.debug ?? false,
      strategy: options.strategy ?? defaultRunConfig.strategy,
      marginBytes
    };
  });
