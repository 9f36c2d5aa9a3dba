import path from "node:path"
import { stat } from "node:fs/promises"

import type { ProcessRunner } from "../process/runner.js"
import type { DiffStat, HistoryEntry, VersionControl } from "./version-control.js"

const LOG_FIELD_SEPARATOR = "\t"

const readCount = (source: string, pattern: RegExp): number => {
  const match = pattern.exec(source)
  return match?.[1] ? Number.parseInt(match[1], 10) : 0
}

export const safeDirectoryArgs = (directory: string): string[] => {
  return ["-c", `safe.directory=${directory}`]
}

/**
 * Parses `git diff --shortstat` output, e.g.
 * ` 3 files changed, 10 insertions(+), 2 deletions(-)`. Either count may be missing.
 */
export const parseShortStat = (source: string): DiffStat => {
  return {
    filesChanged: readCount(source, /(\d+) files? changed/),
    insertions: readCount(source, /(\d+) insertions?\(\+\)/),
    deletions: readCount(source, /(\d+) deletions?\(-\)/),
  }
}

export const parseLog = (source: string): HistoryEntry[] => {
  return source
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const [id = "", committedAt = "", ...subject] = line.split(LOG_FIELD_SEPARATOR)
      return {
        id,
        committedAt,
        subject: subject.join(LOG_FIELD_SEPARATOR),
      }
    })
}

/**
 * Git-backed version control. Every call is a separate `git` invocation in the target
 * directory; failures surface as `process_failed` errors. Each call marks the directory as
 * safe: setup runs as root against a repository owned by the service user.
 *
 * @param runner Process runner used to invoke git.
 * @param gitCommand Git executable name or path.
 */
export const createGitVersionControl = (
  runner: ProcessRunner,
  gitCommand = "git"
): VersionControl => {
  const git = async (directory: string, args: string[], acceptExitCodes?: number[]) => {
    return await runner.run({
      command: gitCommand,
      args: [...safeDirectoryArgs(directory), ...args],
      cwd: directory,
      acceptExitCodes,
    })
  }

  const resolveHead = async (directory: string): Promise<string> => {
    const head = await git(directory, ["rev-parse", "HEAD"])
    return head.stdout.trim()
  }

  return {
    isRepository: async (directory) => {
      try {
        const metadata = await stat(path.join(directory, ".git"))
        return metadata.isDirectory()
      } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
          return false
        }

        throw error
      }
    },
    initialize: async (directory, identity) => {
      await git(directory, ["init", "--quiet"])
      await git(directory, ["config", "user.email", identity.email])
      await git(directory, ["config", "user.name", identity.name])
    },
    stageAll: async (directory) => {
      await git(directory, ["add", "--all"])
    },
    stagedDiffStat: async (directory) => {
      const quiet = await git(directory, ["diff", "--cached", "--quiet"], [1])
      if (quiet.exitCode === 0) {
        return null
      }

      const shortStat = await git(directory, ["diff", "--cached", "--shortstat"])
      return parseShortStat(shortStat.stdout)
    },
    commit: async (directory, message, options = {}) => {
      const args = ["commit", "--quiet", "--message", message]
      if (options.allowEmpty) {
        args.push("--allow-empty")
      }

      await git(directory, args)
      return await resolveHead(directory)
    },
    tag: async (directory, name, commitId) => {
      await git(directory, ["tag", name, commitId])
    },
    hasTag: async (directory, name) => {
      const result = await git(directory, ["rev-parse", "--verify", "--quiet", `refs/tags/${name}`], [1])
      return result.exitCode === 0
    },
    resolveHead,
    log: async (directory, limit) => {
      const result = await git(directory, ["log", `--max-count=${limit}`, "--format=%H%x09%cI%x09%s"])
      return parseLog(result.stdout)
    },
    passthrough: async (directory, args) => {
      return await runner.runAttached({
        command: gitCommand,
        args: [...safeDirectoryArgs(directory), ...args],
        cwd: directory,
      })
    },
  }
}
