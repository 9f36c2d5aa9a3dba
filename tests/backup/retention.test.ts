import { describe, expect, it } from "vitest"

import { enforceRetention, listArchives, selectExpiredArchives } from "../../src/backup/retention.js"
import { hourlyArchiveNames } from "../support/archive-names.js"
import { createMemoryObjectStore } from "../support/memory-object-store.js"
import { createSilentLogger } from "../support/silent-logger.js"

const toKeys = (names: string[]): string[] => names.map((name) => `backups/${name}`)

describe("selectExpiredArchives", () => {
  it("expires everything but the newest archives, oldest first", () => {
    const names = hourlyArchiveNames(5)

    expect(selectExpiredArchives([...names].reverse(), 3)).toEqual(names.slice(0, 2))
  })

  it("keeps everything when the count is unlimited or not reached", () => {
    const names = hourlyArchiveNames(3)

    expect(selectExpiredArchives(names, null)).toEqual([])
    expect(selectExpiredArchives(names, 3)).toEqual([])
  })

  it("expires every archive when the count is zero", () => {
    const names = hourlyArchiveNames(2)

    expect(selectExpiredArchives(names, 0)).toEqual(names)
  })
})

describe("listArchives", () => {
  it("ignores objects that are not archives and sorts the rest", async () => {
    const names = hourlyArchiveNames(2)
    const store = createMemoryObjectStore([...toKeys([...names].reverse()), "backups/README", "other/x"])

    expect(await listArchives(store)).toEqual(names)
  })
})

describe("enforceRetention", () => {
  it("deletes exactly the two oldest of 170 archives when keeping 168", async () => {
    // Arrange
    const names = hourlyArchiveNames(170)
    const store = createMemoryObjectStore(toKeys(names))

    // Act
    const result = await enforceRetention(store, { count: 168 }, createSilentLogger())

    // Assert
    expect(result).toEqual({ deleted: names.slice(0, 2), failedDeletes: [] })
    expect(await listArchives(store)).toEqual(names.slice(2))
  })

  it("deletes nothing when fewer archives exist than the count", async () => {
    // Arrange
    const names = hourlyArchiveNames(10)
    const store = createMemoryObjectStore(toKeys(names))

    // Act
    const result = await enforceRetention(store, { count: 168 }, createSilentLogger())

    // Assert
    expect(result).toEqual({ deleted: [], failedDeletes: [] })
    expect(store.calls).toEqual(["list backups"])
  })

  it("does not even list when retention is unlimited", async () => {
    const store = createMemoryObjectStore(toKeys(hourlyArchiveNames(3)))

    await enforceRetention(store, { count: null }, createSilentLogger())

    expect(store.calls).toEqual([])
  })

  it("logs and skips a failed delete", async () => {
    // Arrange
    const names = hourlyArchiveNames(4)
    const store = createMemoryObjectStore(toKeys(names))
    store.failingDeletes.add(`backups/${names[0]}`)
    const logger = createSilentLogger()

    // Act
    const result = await enforceRetention(store, { count: 2 }, logger)

    // Assert
    expect(result).toEqual({ deleted: [names[1]], failedDeletes: [names[0]] })
    expect(logger.warn).toHaveBeenCalledOnce()
  })
})
