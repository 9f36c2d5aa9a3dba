import { readdir, readFile } from "node:fs/promises"
import path from "node:path"

import { afterEach, describe, expect, it, vi } from "vitest"

import { createArchive, extractArchive } from "../../src/backup/archive.js"
import { formatRestoreTag, runRestore } from "../../src/backup/restore.js"
import { StewardError } from "../../src/errors.js"
import type { CommitResult } from "../../src/history/tracker.js"
import { hourlyArchiveNames } from "../support/archive-names.js"
import { createMemoryObjectStore, type MemoryObjectStore } from "../support/memory-object-store.js"
import { createSilentLogger } from "../support/silent-logger.js"
import { cleanupTempDirs, createTempDir, writeTree } from "../support/temp-dirs.js"

afterEach(cleanupTempDirs)

const ARCHIVE_NAME = "openclaw-20261018-120000.tar.gz"

const storeWithArchive = async (files: Record<string, string>): Promise<MemoryObjectStore> => {
  const snapshot = await createTempDir("openclaw-snapshot-")
  const work = await createTempDir("openclaw-work-")
  await writeTree(snapshot, files)
  const archivePath = path.join(work, ARCHIVE_NAME)
  await createArchive(snapshot, archivePath)

  const store = createMemoryObjectStore()
  await store.upload(archivePath, `backups/${ARCHIVE_NAME}`)
  store.calls.length = 0
  return store
}

describe("formatRestoreTag", () => {
  it("uses the fixed-width UTC stamp", () => {
    expect(formatRestoreTag(new Date("2026-01-02T03:04:05Z"))).toBe("pre-restore-20260102-030405")
  })
})

describe("runRestore", () => {
  it("lists available archives in order and mutates nothing without a name", async () => {
    // Arrange
    const names = hourlyArchiveNames(3)
    const store = createMemoryObjectStore([...names].reverse().map((name) => `backups/${name}`))
    const history = {
      commitIfChanged: vi.fn(async (): Promise<CommitResult> => ({ committed: false })),
      tagHead: vi.fn(async () => "abc1234"),
    }
    const extract = vi.fn(async () => {})

    // Act
    const result = await runRestore(
      { dataDir: "/srv/openclaw", destination: store, archiveName: null },
      { history, logger: createSilentLogger(), extract }
    )

    // Assert
    expect(result).toEqual({ mode: "list", archives: names })
    expect(store.calls).toEqual(["list backups"])
    expect(history.commitIfChanged).not.toHaveBeenCalled()
    expect(extract).not.toHaveBeenCalled()
  })

  it("lists every object under the backups prefix, not only conventional names", async () => {
    const store = createMemoryObjectStore([
      "backups/openclaw-20261018-120000.tar.gz",
      "backups/manual-before-upgrade.tar.gz",
    ])

    const result = await runRestore(
      { dataDir: "/srv/openclaw", destination: store },
      { history: null, logger: createSilentLogger() }
    )

    expect(result).toEqual({
      mode: "list",
      archives: ["manual-before-upgrade.tar.gz", "openclaw-20261018-120000.tar.gz"],
    })
  })

  it("treats a blank name as a listing request", async () => {
    const store = createMemoryObjectStore()

    const result = await runRestore(
      { dataDir: "/srv/openclaw", destination: store, archiveName: "  " },
      { history: null, logger: createSilentLogger() }
    )

    expect(result).toEqual({ mode: "list", archives: [] })
  })

  it("commits and tags the local state before extraction overwrites it", async () => {
    // Arrange
    const store = await storeWithArchive({ "data/notes.md": "archived" })
    const dataDir = await createTempDir("openclaw-data-")
    const temporaryRoot = await createTempDir("openclaw-tmp-")
    await writeTree(dataDir, { "data/notes.md": "local edit" })
    const events: string[] = []
    const history = {
      commitIfChanged: vi.fn(async (directory: string): Promise<CommitResult> => {
        const contents = await readFile(path.join(directory, "data", "notes.md"), "utf8")
        events.push(`commit saw ${contents}`)
        return {
          committed: true,
          commitId: "abc1234",
          message: "auto",
          stat: { filesChanged: 1, insertions: 1, deletions: 1 },
        }
      }),
      tagHead: vi.fn(async (_directory: string, name: string) => {
        events.push(`tag ${name}`)
        return "abc1234"
      }),
    }

    // Act
    const result = await runRestore(
      { dataDir, destination: store, archiveName: ARCHIVE_NAME },
      {
        history,
        logger: createSilentLogger(),
        now: () => new Date("2026-10-18T13:05:09Z"),
        temporaryRoot,
        extract: async (archivePath, target) => {
          events.push("extract")
          await extractArchive(archivePath, target)
        },
      }
    )

    // Assert
    expect(events).toEqual([
      "commit saw local edit",
      "tag pre-restore-20261018-130509",
      "extract",
    ])
    expect(await readFile(path.join(dataDir, "data", "notes.md"), "utf8")).toBe("archived")
    expect(result).toMatchObject({
      mode: "restored",
      archiveName: ARCHIVE_NAME,
      safetyTag: "pre-restore-20261018-130509",
      restartRequired: true,
    })
    expect(await readdir(temporaryRoot)).toEqual([])
  })

  it("proceeds when the safety commit fails", async () => {
    // Arrange
    const store = await storeWithArchive({ "data/notes.md": "archived" })
    const dataDir = await createTempDir("openclaw-data-")
    const logger = createSilentLogger()
    const history = {
      commitIfChanged: vi.fn(async (): Promise<CommitResult> => {
        throw new Error("repository is corrupt")
      }),
      tagHead: vi.fn(async () => "abc1234"),
    }

    // Act
    const result = await runRestore(
      { dataDir, destination: store, archiveName: ARCHIVE_NAME },
      { history, logger }
    )

    // Assert
    expect(result).toMatchObject({ mode: "restored", safetyCommit: null, safetyTag: null })
    expect(history.tagHead).not.toHaveBeenCalled()
    expect(await readFile(path.join(dataDir, "data", "notes.md"), "utf8")).toBe("archived")
    expect(logger.warn).toHaveBeenCalledOnce()
  })

  it("fails fast for an archive that does not exist remotely", async () => {
    // Arrange
    const store = createMemoryObjectStore(hourlyArchiveNames(1).map((name) => `backups/${name}`))
    const history = {
      commitIfChanged: vi.fn(async (): Promise<CommitResult> => ({ committed: false })),
      tagHead: vi.fn(async () => "abc1234"),
    }

    // Act
    const outcome = runRestore(
      { dataDir: "/srv/openclaw", destination: store, archiveName: ARCHIVE_NAME },
      { history, logger: createSilentLogger() }
    )

    // Assert
    await expect(outcome).rejects.toThrow(`Backup ${ARCHIVE_NAME} not found under backups/`)
    await expect(outcome).rejects.toBeInstanceOf(StewardError)
    expect(store.calls).toEqual(["list backups"])
    expect(history.commitIfChanged).not.toHaveBeenCalled()
  })

  it("rejects names that would escape the backups prefix", async () => {
    const store = createMemoryObjectStore()

    await expect(
      runRestore(
        { dataDir: "/srv/openclaw", destination: store, archiveName: "../secrets.tar.gz" },
        { history: null, logger: createSilentLogger() }
      )
    ).rejects.toThrow("archive: '../secrets.tar.gz' is not a plain backup file name")
    expect(store.calls).toEqual([])
  })
})
