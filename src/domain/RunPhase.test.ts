import { describe, expect, test } from "vitest"
import { abortKind, hasTouchedDisk } from "./RunPhase"

describe("RunPhase", () => {
  test("phases before Erase leave the disk untouched", () => {
    expect(hasTouchedDisk("Discover")).toBe(false)
    expect(hasTouchedDisk("Confirm")).toBe(false)
    expect(abortKind("Plan")).toBe("Failed")
  })

  test("phases from Erase on are partial", () => {
    expect(hasTouchedDisk("Erase")).toBe(true)
    expect(abortKind("Write")).toBe("Partial")
  })
})
