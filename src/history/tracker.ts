import path from "node:path"
import { writeFile } from "node:fs/promises"

import type { Logger } from "pino"

import {
  formatDiffStat,
  type CommitIdentity,
  type DiffStat,
  type HistoryEntry,
  type VersionControl,
} from "./version-control.js"

/** Volatile, log, cache and secret subtrees never enter the history. */
export const HISTORY_IGNORE_ENTRIES = [
  "logs/",
  "cache/",
  "*.tmp",
  "node_modules/",
  ".npm/",
  "secrets/",
] as const

export const BOOTSTRAP_TAG = "history-root"
export const BOOTSTRAP_MESSAGE = "init: history root"

export const HISTORY_IDENTITY: CommitIdentity = {
  name: "OpenClaw History Tracker",
  email: "openclaw-history@localhost",
}

export type CommitResult =
  | {
      committed: false
    }
  | {
      committed: true
      commitId: string
      message: string
      stat: DiffStat
    }

export type HistoryTracker = {
  ensureRepository: (directory: string) => Promise<boolean>
  commitIfChanged: (directory: string) => Promise<CommitResult>
  recentHistory: (directory: string, limit: number) => Promise<HistoryEntry[]>
  /** Tags the current commit so it stays reachable; resolves with the tagged id. */
  tagHead: (directory: string, name: string) => Promise<string>
}

type HistoryTrackerDependencies = {
  versionControl: VersionControl
  logger: Pick<Logger, "info" | "debug">
  now?: () => Date
}

/**
 * Formats a UTC ISO-8601 timestamp at second precision, e.g. `2026-10-18T14:25:00Z`.
 */
export const formatCommitTimestamp = (date: Date): string => {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z")
}

export const buildCommitMessage = (date: Date, stat: DiffStat): string => {
  return `auto: ${formatCommitTimestamp(date)} - ${formatDiffStat(stat)}`
}

/**
 * Keeps a linear commit history of the data directory. Initialisation is idempotent and a
 * commit is only created when the staged tree differs from the last commit. No locking:
 * concurrent writers are serialised by the supervisor.
 */
export const createHistoryTracker = (dependencies: HistoryTrackerDependencies): HistoryTracker => {
  const { versionControl, logger } = dependencies
  const now = dependencies.now ?? (() => new Date())

  const isInitialised = async (directory: string): Promise<boolean> => {
    return (
      (await versionControl.isRepository(directory)) &&
      (await versionControl.hasTag(directory, BOOTSTRAP_TAG))
    )
  }

  // The root tag is written last, so a bootstrap interrupted after `init` runs again.
  const ensureRepository = async (directory: string): Promise<boolean> => {
    if (await isInitialised(directory)) {
      return false
    }

    await versionControl.initialize(directory, HISTORY_IDENTITY)
    await writeFile(
      path.join(directory, ".gitignore"),
      `${HISTORY_IGNORE_ENTRIES.join("\n")}\n`,
      "utf8"
    )
    await versionControl.stageAll(directory)

    const commitId = await versionControl.commit(directory, BOOTSTRAP_MESSAGE, {
      allowEmpty: true,
    })
    await versionControl.tag(directory, BOOTSTRAP_TAG, commitId)

    logger.info({ directory, commitId }, "History repository initialised")

    return true
  }

  const commitIfChanged = async (directory: string): Promise<CommitResult> => {
    await ensureRepository(directory)
    await versionControl.stageAll(directory)

    const stat = await versionControl.stagedDiffStat(directory)
    if (stat === null) {
      logger.debug({ directory }, "No changes to commit")
      return { committed: false }
    }

    const message = buildCommitMessage(now(), stat)
    const commitId = await versionControl.commit(directory, message)

    logger.info({ directory, commitId, ...stat }, "History commit created")

    return {
      committed: true,
      commitId,
      message,
      stat,
    }
  }

  const recentHistory = async (directory: string, limit: number): Promise<HistoryEntry[]> => {
    if (!(await versionControl.isRepository(directory))) {
      return []
    }

    return await versionControl.log(directory, limit)
  }

  const tagHead = async (directory: string, name: string): Promise<string> => {
    const commitId = await versionControl.resolveHead(directory)
    await versionControl.tag(directory, name, commitId)

    logger.info({ directory, commitId, tag: name }, "History tag created")

    return commitId
  }

  return {
    ensureRepository,
    commitIfChanged,
    recentHistory,
    tagHead,
  }
}
