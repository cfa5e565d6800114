import { describe, expect, test } from "vitest"
import { Effect, Layer, Logger, pipe } from "effect"
import { runList, withConfigLogLevel } from "./handler"
import { createScenario } from "../test/multibootScenario"

/** Log lines as "LEVEL message" */
const captureLogs = () => {
  const lines: string[] = []
  const layer = Logger.replace(
    Logger.defaultLogger,
    Logger.make(({ logLevel, message }) => {
      lines.push(`${logLevel.label} ${String(message)}`)
    })
  )
  return { lines, layer }
}

describe("withConfigLogLevel", () => {
  test("shows debug logs only when the config asks for them", () => {
    const logDebug = (debug: boolean) => {
      const logs = captureLogs()
      Effect.runSync(pipe(Effect.logDebug("details"), withConfigLogLevel({ debug }), Effect.provide(logs.layer)))
      return logs.lines
    }

    expect(logDebug(true)).toEqual(["DEBUG details"])
    expect(logDebug(false)).toEqual([])
  })
})

describe("runList", () => {
  const debugLines = async (debug: boolean) => {
    const scenario = createScenario()
    const logs = captureLogs()
    await Effect.runPromise(
      pipe(runList({ debug, appDir: "/Applications" }), Effect.provide(Layer.merge(scenario.layer, logs.layer)))
    )
    return logs.lines.filter((line) => line.startsWith("DEBUG "))
  }

  test("logs installer discovery with --debug", async () => {
    const lines = await debugLines(true)

    expect(lines.some((line) => line.startsWith("DEBUG Found macOS Sonoma at /Applications/Install macOS Sonoma.app"))).toBe(
      true
    )
  })

  test("keeps debug logs quiet by default", async () => {
    expect(await debugLines(false)).toEqual([])
  })
})
