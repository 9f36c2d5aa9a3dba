import { describe, expect, it } from "vitest"

import { formatArchiveName, isArchiveName, toBackupArchive } from "../../src/backup/archive-name.js"

describe("formatArchiveName", () => {
  it("uses a zero-padded UTC timestamp", () => {
    expect(formatArchiveName(new Date("2026-03-04T05:06:07.890Z"))).toBe(
      "openclaw-20260304-050607.tar.gz"
    )
  })

  it("sorts lexicographically in creation order", () => {
    const names = [
      formatArchiveName(new Date("2026-10-18T09:59:59Z")),
      formatArchiveName(new Date("2026-10-18T10:00:00Z")),
      formatArchiveName(new Date("2027-01-01T00:00:00Z")),
    ]

    expect([...names].reverse().sort()).toEqual(names)
  })
})

describe("isArchiveName", () => {
  it("accepts only the fixed naming convention", () => {
    expect(isArchiveName("openclaw-20261018-120000.tar.gz")).toBe(true)
    expect(isArchiveName("openclaw-2026101-120000.tar.gz")).toBe(false)
    expect(isArchiveName("notes.txt")).toBe(false)
  })
})

describe("toBackupArchive", () => {
  it("places archives under the backups prefix", () => {
    expect(toBackupArchive("openclaw-20261018-120000.tar.gz")).toEqual({
      name: "openclaw-20261018-120000.tar.gz",
      remoteKey: "backups/openclaw-20261018-120000.tar.gz",
    })
  })
})
