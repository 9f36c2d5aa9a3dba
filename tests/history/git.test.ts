import { describe, expect, it } from "vitest"

import { createGitVersionControl, parseLog, parseShortStat } from "../../src/history/git.js"
import { formatDiffStat } from "../../src/history/version-control.js"
import { createFakeProcessRunner } from "../support/fake-process-runner.js"

const SAFE_DIRECTORY = ["-c", "safe.directory=/srv/data"]

describe("parseShortStat", () => {
  it("reads all three counts", () => {
    expect(parseShortStat(" 3 files changed, 10 insertions(+), 2 deletions(-)\n")).toEqual({
      filesChanged: 3,
      insertions: 10,
      deletions: 2,
    })
  })

  it("treats a missing count as zero", () => {
    expect(parseShortStat(" 1 file changed, 1 deletion(-)\n")).toEqual({
      filesChanged: 1,
      insertions: 0,
      deletions: 1,
    })
  })
})

describe("parseLog", () => {
  it("splits tab-separated fields and keeps tabs inside the subject", () => {
    const entries = parseLog("abc123\t2026-10-18T10:00:00+00:00\tauto: one\tmore\n\n")

    expect(entries).toEqual([
      { id: "abc123", committedAt: "2026-10-18T10:00:00+00:00", subject: "auto: one\tmore" },
    ])
  })
})

describe("formatDiffStat", () => {
  it("pluralizes each count independently", () => {
    expect(formatDiffStat({ filesChanged: 2, insertions: 1, deletions: 0 })).toBe(
      "2 files changed, 1 insertion(+), 0 deletions(-)"
    )
  })
})

describe("createGitVersionControl", () => {
  it("reports no staged changes when the quiet diff exits cleanly", async () => {
    // Arrange
    const runner = createFakeProcessRunner()
    const git = createGitVersionControl(runner)

    // Act
    const stat = await git.stagedDiffStat("/srv/data")

    // Assert
    expect(stat).toBeNull()
    expect(runner.requests).toEqual([
      {
        command: "git",
        args: [...SAFE_DIRECTORY, "diff", "--cached", "--quiet"],
        cwd: "/srv/data",
        acceptExitCodes: [1],
      },
    ])
  })

  it("reads the shortstat when the quiet diff reports changes", async () => {
    // Arrange
    const runner = createFakeProcessRunner((request) => {
      if (request.args.includes("--quiet")) {
        return { exitCode: 1 }
      }
      return { stdout: " 1 file changed, 4 insertions(+)\n" }
    })
    const git = createGitVersionControl(runner)

    // Act
    const stat = await git.stagedDiffStat("/srv/data")

    // Assert
    expect(stat).toEqual({ filesChanged: 1, insertions: 4, deletions: 0 })
    expect(runner.requests.map((request) => request.args)).toEqual([
      [...SAFE_DIRECTORY, "diff", "--cached", "--quiet"],
      [...SAFE_DIRECTORY, "diff", "--cached", "--shortstat"],
    ])
  })

  it("commits and returns the new head", async () => {
    // Arrange
    const runner = createFakeProcessRunner((request) =>
      request.args.includes("rev-parse") ? { stdout: "deadbeef\n" } : undefined
    )
    const git = createGitVersionControl(runner)

    // Act
    const commitId = await git.commit("/srv/data", "init: history root", { allowEmpty: true })

    // Assert
    expect(commitId).toBe("deadbeef")
    expect(runner.requests.map((request) => request.args)).toEqual([
      [...SAFE_DIRECTORY, "commit", "--quiet", "--message", "init: history root", "--allow-empty"],
      [...SAFE_DIRECTORY, "rev-parse", "HEAD"],
    ])
  })

  it("configures the commit identity on initialisation", async () => {
    // Arrange
    const runner = createFakeProcessRunner()
    const git = createGitVersionControl(runner)

    // Act
    await git.initialize("/srv/data", { name: "Tracker", email: "tracker@localhost" })

    // Assert
    expect(runner.requests.map((request) => request.args)).toEqual([
      [...SAFE_DIRECTORY, "init", "--quiet"],
      [...SAFE_DIRECTORY, "config", "user.email", "tracker@localhost"],
      [...SAFE_DIRECTORY, "config", "user.name", "Tracker"],
    ])
  })

  it("passes raw arguments through with the terminal attached", async () => {
    // Arrange
    const runner = createFakeProcessRunner(() => ({ exitCode: 128 }))
    const git = createGitVersionControl(runner, "/usr/bin/git")

    // Act
    const exitCode = await git.passthrough("/srv/data", ["log", "--oneline"])

    // Assert
    expect(exitCode).toBe(128)
    expect(runner.requests).toEqual([
      { command: "/usr/bin/git", args: [...SAFE_DIRECTORY, "log", "--oneline"], cwd: "/srv/data" },
    ])
  })

  it("reports a missing tag from the verify exit code", async () => {
    // Arrange
    const runner = createFakeProcessRunner(() => ({ exitCode: 1 }))
    const git = createGitVersionControl(runner)

    // Act
    const exists = await git.hasTag("/srv/data", "history-root")

    // Assert
    expect(exists).toBe(false)
    expect(runner.requests[0]?.args).toEqual([
      ...SAFE_DIRECTORY,
      "rev-parse",
      "--verify",
      "--quiet",
      "refs/tags/history-root",
    ])
  })
})
