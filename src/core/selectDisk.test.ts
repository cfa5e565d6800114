import { describe, expect, test } from "vitest"
import { Option } from "effect"
import { parseDiskChoice } from "./selectDisk"

describe("parseDiskChoice", () => {
  test("maps a 1-based answer to an index", () => {
    expect(Option.getOrUndefined(parseDiskChoice("1", 3))).toBe(0)
    expect(Option.getOrUndefined(parseDiskChoice(" 3 ", 3))).toBe(2)
  })

  test("rejects answers outside the list", () => {
    expect(Option.isNone(parseDiskChoice("0", 3))).toBe(true)
    expect(Option.isNone(parseDiskChoice("4", 3))).toBe(true)
  })

  test("rejects anything that is not a whole number", () => {
    for (const input of ["", "two", "1.5", "-1", "1a", "/dev/disk4"]) {
      expect(Option.isNone(parseDiskChoice(input, 3))).toBe(true)
    }
  })
})
