import { readFile, readdir, stat } from "node:fs/promises"
import path from "node:path"

import { afterEach, describe, expect, it } from "vitest"

import { createArchive, extractArchive, isExcludedFromArchive } from "../../src/backup/archive.js"
import { StewardError } from "../../src/errors.js"
import { cleanupTempDirs, createTempDir, writeTree } from "../support/temp-dirs.js"

afterEach(cleanupTempDirs)

const exists = async (target: string): Promise<boolean> => {
  try {
    await stat(target)
    return true
  } catch {
    return false
  }
}

describe("isExcludedFromArchive", () => {
  it("excludes volatile and secret subtrees at any depth", () => {
    expect(isExcludedFromArchive("./logs")).toBe(true)
    expect(isExcludedFromArchive("./data/cache/blob")).toBe(true)
    expect(isExcludedFromArchive("secrets/token")).toBe(true)
    expect(isExcludedFromArchive("./data/draft.tmp")).toBe(true)
  })

  it("keeps regular data", () => {
    expect(isExcludedFromArchive(".")).toBe(false)
    expect(isExcludedFromArchive("./data/notes.md")).toBe(false)
    expect(isExcludedFromArchive("./config/models.json")).toBe(false)
    expect(isExcludedFromArchive("./data/catalogue.tmp.json")).toBe(false)
  })
})

describe("createArchive and extractArchive", () => {
  it("round-trips data while leaving excluded paths out", async () => {
    // Arrange
    const source = await createTempDir("openclaw-archive-source-")
    const work = await createTempDir("openclaw-archive-work-")
    const target = await createTempDir("openclaw-archive-target-")
    await writeTree(source, {
      "data/notes.md": "hello",
      "config/models.json": "{}",
      "logs/gateway.log": "noise",
      "cache/blob": "noise",
      "secrets/token": "test-secret",
      "data/draft.tmp": "noise",
    })
    const archivePath = path.join(work, "openclaw-20261018-120000.tar.gz")

    // Act
    await createArchive(source, archivePath)
    await extractArchive(archivePath, target)

    // Assert
    expect((await readdir(target)).sort()).toEqual(["config", "data"])
    expect(await readFile(path.join(target, "data", "notes.md"), "utf8")).toBe("hello")
    expect(await exists(path.join(target, "data", "draft.tmp"))).toBe(false)
  })

  it("overwrites conflicting files on extraction", async () => {
    // Arrange
    const source = await createTempDir("openclaw-archive-source-")
    const work = await createTempDir("openclaw-archive-work-")
    const target = await createTempDir("openclaw-archive-target-")
    await writeTree(source, { "data/notes.md": "archived" })
    await writeTree(target, { "data/notes.md": "local edit", "data/extra.md": "kept" })
    const archivePath = path.join(work, "archive.tar.gz")
    await createArchive(source, archivePath)

    // Act
    await extractArchive(archivePath, target)

    // Assert
    expect(await readFile(path.join(target, "data", "notes.md"), "utf8")).toBe("archived")
    expect(await readFile(path.join(target, "data", "extra.md"), "utf8")).toBe("kept")
  })

  it("reports a missing archive as an archive failure", async () => {
    const target = await createTempDir("openclaw-archive-target-")

    await expect(extractArchive(path.join(target, "absent.tar.gz"), target)).rejects.toBeInstanceOf(
      StewardError
    )
  })
})
