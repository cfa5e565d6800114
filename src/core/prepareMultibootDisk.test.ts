import { describe, expect, test } from "vitest"
import { Effect, Either, pipe } from "effect"
import { prepareMultibootDisk, type RunOutcome } from "./prepareMultibootDisk"
import type { RunConfig } from "../domain/RunConfig"
import { diskInfoPlist } from "../test/plistFixtures"
import { failed, ok } from "../test/TestContext"
import {
  DEFAULT_APPS,
  GB,
  USB_DISK,
  createScenario,
  diskutilVerbs,
  shellLines,
  testConfig,
  toolPath,
} from "../test/multibootScenario"

type Scenario = ReturnType<typeof createScenario>

const run = (scenario: Scenario, config: RunConfig = testConfig) =>
  Effect.runPromise(pipe(prepareMultibootDisk(config), Effect.either, Effect.provide(scenario.layer)))

const outcome = async (scenario: Scenario, config?: RunConfig): Promise<RunOutcome> => {
  const result = await run(scenario, config)
  if (Either.isLeft(result)) throw new Error(`run aborted in ${result.left.phase}`)
  return result.right
}

const aborted = async (scenario: Scenario, config?: RunConfig) => {
  const result = await run(scenario, config)
  if (Either.isRight(result)) throw new Error(`expected an abort, got ${result.right._tag}`)
  return result.left
}

const report = async (scenario: Scenario, config?: RunConfig) => {
  const result = await outcome(scenario, config)
  if (result._tag !== "Completed") throw new Error(`expected Completed, got ${result._tag}`)
  return result.report
}

const toolCalls = (scenario: Scenario) => scenario.ctx.calls.shell.filter((c) => c.command.endsWith("createinstallmedia"))

describe("prepareMultibootDisk", () => {
  test("partitions the disk and writes every installer in order", async () => {
    const scenario = createScenario()
    scenario.ctx.answers.push("1", "YES")

    const result = await report(scenario)

    expect(result.results.map((r) => [r.entry.volumeName, r.status, r.volumePath])).toEqual([
      ["INSTALL_SONOMA", "succeeded", "/Volumes/Install macOS Sonoma"],
      ["INSTALL_MONTEREY", "succeeded", "/Volumes/Install macOS Monterey"],
      ["INSTALL_ELCAPITAN", "succeeded", "/Volumes/Install OS X El Capitan"],
    ])
    expect(result.succeeded).toBe(3)
    expect(shellLines(scenario.ctx)).toContain(
      "diskutil partitionDisk /dev/disk4 GPT JHFS+ INSTALL_SONOMA 45743M JHFS+ INSTALL_MONTEREY 45743M JHFS+ INSTALL_ELCAPITAN 0b"
    )
  })

  test("unmounts before partitioning and partitions before writing", async () => {
    const scenario = createScenario()
    scenario.ctx.answers.push("1", "YES")

    await report(scenario)

    const lines = shellLines(scenario.ctx)
    const unmount = lines.indexOf("diskutil unmountDisk /dev/disk4")
    const partition = lines.findIndex((line) => line.startsWith("diskutil partitionDisk"))
    const firstWrite = lines.findIndex((line) => line.startsWith(toolPath("Install macOS Sonoma.app")))
    expect(unmount).toBeGreaterThanOrEqual(0)
    expect(partition).toBeGreaterThan(unmount)
    expect(firstWrite).toBeGreaterThan(partition)
  })

  test("sizes partitions to their minimum with the minimum strategy", async () => {
    const scenario = createScenario()
    scenario.ctx.answers.push("1", "YES")

    await report(scenario, { ...testConfig, strategy: "minimum" })

    expect(shellLines(scenario.ctx)).toContain(
      "diskutil partitionDisk /dev/disk4 GPT JHFS+ INSTALL_SONOMA 13873M JHFS+ INSTALL_MONTEREY 13873M JHFS+ INSTALL_ELCAPITAN 0b"
    )
  })

  test("stops before touching any disk when no installer is found", async () => {
    const scenario = createScenario([])

    const result = await outcome(scenario)

    expect(result._tag).toBe("NoInstallers")
    expect(diskutilVerbs(scenario.ctx)).toEqual([])
    expect(scenario.ctx.calls.prompts).toEqual([])
  })

  test("aborts in Discover when the application directory is missing", async () => {
    const scenario = createScenario()
    scenario.ctx.remove("/Applications")

    const error = await aborted(scenario)

    expect(error.phase).toBe("Discover")
    expect(error.error).toMatchObject({ _tag: "InstallerDirNotFound", path: "/Applications" })
  })

  test("aborts in Select when no external disk is attached", async () => {
    const scenario = createScenario(DEFAULT_APPS, [])

    const error = await aborted(scenario)

    expect(error.phase).toBe("Select")
    expect(error.error).toMatchObject({ _tag: "NoExternalDisks" })
    expect(scenario.ctx.calls.prompts).toEqual([])
  })

  test("cancels without changes when the operator quits the selection", async () => {
    const scenario = createScenario()

    const result = await outcome(scenario)

    expect(result).toEqual({ _tag: "Cancelled", phase: "Select" })
    expect(diskutilVerbs(scenario.ctx)).toEqual(["list", "info"])
  })

  test("asks again after an invalid choice", async () => {
    const scenario = createScenario()
    scenario.ctx.answers.push("9", "first", "1", "YES")

    const result = await outcome(scenario)

    expect(result._tag).toBe("Completed")
    expect(scenario.ctx.calls.prompts.slice(0, 3)).toEqual([
      "Select the target disk [1-1]",
      "Select the target disk [1-1]",
      "Select the target disk [1-1]",
    ])
  })

  test("aborts after too many invalid choices", async () => {
    const scenario = createScenario()
    scenario.ctx.answers.push("0", "9", "abc")

    const error = await aborted(scenario)

    expect(error.phase).toBe("Select")
    expect(error.error).toMatchObject({ _tag: "SelectionAttemptsExceeded", attempts: 3 })
  })

  test.each(["no", "yes", "Y", ""])("does not erase when the confirmation is %j", async (answer) => {
    const scenario = createScenario()
    scenario.ctx.answers.push("1", answer)

    const result = await outcome(scenario)

    expect(result).toEqual({ _tag: "Cancelled", phase: "Confirm" })
    const verbs = diskutilVerbs(scenario.ctx)
    expect(verbs).not.toContain("unmountDisk")
    expect(verbs).not.toContain("partitionDisk")
    expect(verbs).not.toContain("eraseDisk")
  })

  test("does not erase when the operator quits the confirmation", async () => {
    const scenario = createScenario()
    scenario.ctx.answers.push("1")

    const result = await outcome(scenario)

    expect(result).toEqual({ _tag: "Cancelled", phase: "Confirm" })
    expect(diskutilVerbs(scenario.ctx)).not.toContain("partitionDisk")
  })

  test("asks a second time for a disk that reports itself internal", async () => {
    const scenario = createScenario()
    scenario.ctx.onCommand("diskutil", ["info", "-plist", "/dev/disk4"], ok(diskInfoPlist({ ...USB_DISK, internal: true })))
    scenario.ctx.answers.push("1", "YES", "YES")

    const result = await outcome(scenario)

    expect(result._tag).toBe("Completed")
    expect(scenario.ctx.calls.prompts).toEqual([
      "Select the target disk [1-1]",
      "Type YES to continue with an internal disk",
      "Type YES to erase /dev/disk4",
    ])
  })

  test("stops at the internal disk confirmation", async () => {
    const scenario = createScenario()
    scenario.ctx.onCommand("diskutil", ["info", "-plist", "/dev/disk4"], ok(diskInfoPlist({ ...USB_DISK, internal: true })))
    scenario.ctx.answers.push("1", "no", "YES")

    const result = await outcome(scenario)

    expect(result).toEqual({ _tag: "Cancelled", phase: "Confirm" })
    expect(scenario.ctx.calls.prompts).toHaveLength(2)
    expect(diskutilVerbs(scenario.ctx)).not.toContain("partitionDisk")
  })

  test("aborts in Plan when the disk is too small", async () => {
    const scenario = createScenario(DEFAULT_APPS, [{ ...USB_DISK, size: 20 * GB }])
    scenario.ctx.answers.push("1", "YES")

    const error = await aborted(scenario)

    expect(error.phase).toBe("Plan")
    expect(error.error).toMatchObject({ _tag: "InsufficientCapacity", strategy: "equal" })
    expect(diskutilVerbs(scenario.ctx)).not.toContain("unmountDisk")
  })

  test("aborts in Erase when the disk is busy", async () => {
    const scenario = createScenario()
    scenario.ctx.onCommand("diskutil", ["unmountDisk"], failed(1, "Unmount failed for disk4s2: in use by process 88 (Finder)"))
    scenario.ctx.answers.push("1", "YES")

    const error = await aborted(scenario)

    expect(error.phase).toBe("Erase")
    expect(error.error).toMatchObject({ _tag: "DiskBusy", processName: "Finder", processId: "88" })
    expect(diskutilVerbs(scenario.ctx)).not.toContain("partitionDisk")
  })

  test("aborts in Erase when partitioning fails", async () => {
    const scenario = createScenario()
    scenario.ctx.onCommand("diskutil", ["partitionDisk"], failed(1, "Error: -69888: Couldn't open device"))
    scenario.ctx.answers.push("1", "YES")

    const error = await aborted(scenario)

    expect(error.phase).toBe("Erase")
    expect(error.error).toMatchObject({ _tag: "PartitionFailed", exitCode: 1 })
    expect(toolCalls(scenario)).toEqual([])
  })

  test("keeps writing after one installer fails", async () => {
    const scenario = createScenario()
    scenario.ctx.onCommand(toolPath("Install macOS Monterey.app"), [], failed(1, "Error erasing disk error number (22, 0)"))
    scenario.ctx.answers.push("1", "YES")

    const result = await report(scenario)

    expect(result.results.map((r) => r.status)).toEqual(["succeeded", "failed", "succeeded"])
    expect(result.results[1]).toMatchObject({
      reason: "createinstallmedia exited with 1; the target volume was probably not mounted",
      output: ["Error erasing disk error number (22, 0)"],
    })
    expect(toolCalls(scenario)).toHaveLength(3)
    expect([result.succeeded, result.failed, result.skipped]).toEqual([2, 1, 0])
  })

  test("skips the remaining installers once the disk is gone", async () => {
    const scenario = createScenario()
    scenario.ctx.onCommand(toolPath("Install macOS Sonoma.app"), [], () => {
      scenario.ctx.onCommand("diskutil", ["info", "-plist", "/dev/disk4"], failed(1, "Could not find disk: /dev/disk4"))
      return failed(137, "Killed: 9")
    })
    scenario.ctx.answers.push("1", "YES")

    const result = await report(scenario)

    expect(result.results.map((r) => [r.status, r.reason])).toEqual([
      ["failed", "createinstallmedia was killed (exit 137); free some memory and disk space, then try again"],
      ["skipped", "/dev/disk4 is no longer available"],
      ["skipped", "/dev/disk4 is no longer available"],
    ])
    expect(toolCalls(scenario)).toHaveLength(1)
  })
})
