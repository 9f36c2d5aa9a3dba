import { tmpdir } from "node:os"
import path from "node:path"
import { mkdtemp, rm } from "node:fs/promises"

import type { Logger } from "pino"

import { configurationError, describeError, StewardError } from "../errors.js"
import type { CommitResult, HistoryTracker } from "../history/tracker.js"
import type { ObjectStore } from "../storage/object-store.js"
import { extractArchive, type ArchiveExtractor } from "./archive.js"
import { BACKUP_KEY_PREFIX, formatUtcStamp, toBackupArchive } from "./archive-name.js"

export type RestoreRequest = {
  dataDir: string
  destination: ObjectStore
  archiveName?: string | null
}

export type RestoreDependencies = {
  history: Pick<HistoryTracker, "commitIfChanged" | "tagHead"> | null
  logger: Pick<Logger, "info" | "warn">
  now?: () => Date
  temporaryRoot?: string
  extract?: ArchiveExtractor
}

export type RestoreResult =
  | {
      mode: "list"
      archives: string[]
    }
  | {
      mode: "restored"
      archiveName: string
      safetyCommit: CommitResult | null
      /** Tag on the pre-restore state; archives carry their own `.git`, so HEAD moves. */
      safetyTag: string | null
      /** The running gateway only sees restored state after a restart. */
      restartRequired: true
    }

const assertPlainArchiveName = (name: string): void => {
  const isPlain =
    name !== "." && name !== ".." && !name.includes("/") && !name.includes("\\") && !name.includes("\0")

  if (!isPlain) {
    throw configurationError("archive", `'${name}' is not a plain backup file name`)
  }
}

export const RESTORE_TAG_PREFIX = "pre-restore"

export const formatRestoreTag = (date: Date): string => {
  return `${RESTORE_TAG_PREFIX}-${formatUtcStamp(date)}`
}

type SafetySnapshot = {
  commit: CommitResult | null
  tag: string | null
}

/**
 * Commits local edits, then tags the result. Failures are logged and the restore proceeds.
 */
const snapshotBeforeRestore = async (
  dependencies: RestoreDependencies,
  dataDir: string
): Promise<SafetySnapshot> => {
  const { history, logger } = dependencies
  if (!history) {
    return { commit: null, tag: null }
  }

  const snapshot: SafetySnapshot = { commit: null, tag: null }
  try {
    snapshot.commit = await history.commitIfChanged(dataDir)

    const tag = formatRestoreTag((dependencies.now ?? (() => new Date()))())
    await history.tagHead(dataDir, tag)
    snapshot.tag = tag
  } catch (error) {
    logger.warn(
      { dataDir, error: describeError(error) },
      "Safety snapshot before restore failed; continuing"
    )
  }

  return snapshot
}

/**
 * Without an archive name, lists available backups and changes nothing. With one, downloads
 * it, takes a tagged safety snapshot, and extracts over the data directory. The gateway is not
 * restarted here; that belongs to the supervisor.
 *
 * @param request Data directory, remote store and optional archive name.
 * @param dependencies History tracker, logger and test seams.
 */
export const runRestore = async (
  request: RestoreRequest,
  dependencies: RestoreDependencies
): Promise<RestoreResult> => {
  const archiveName = request.archiveName?.trim() ?? ""

  if (archiveName.length === 0) {
    return {
      mode: "list",
      archives: (await request.destination.list(BACKUP_KEY_PREFIX)).sort(),
    }
  }

  assertPlainArchiveName(archiveName)

  const available = await request.destination.list(BACKUP_KEY_PREFIX)
  if (!available.includes(archiveName)) {
    throw new StewardError(
      "archive_not_found",
      `Backup ${archiveName} not found under ${BACKUP_KEY_PREFIX}/`
    )
  }

  const archive = toBackupArchive(archiveName)
  const extract = dependencies.extract ?? extractArchive
  const workDirectory = await mkdtemp(
    path.join(dependencies.temporaryRoot ?? tmpdir(), "openclaw-restore-")
  )

  try {
    const archivePath = path.join(workDirectory, archive.name)
    await request.destination.download(archive.remoteKey, archivePath)

    const snapshot = await snapshotBeforeRestore(dependencies, request.dataDir)

    await extract(archivePath, request.dataDir)

    dependencies.logger.info(
      { archive: archive.name, dataDir: request.dataDir, safetyTag: snapshot.tag },
      "Backup restored; restart the gateway to apply"
    )

    return {
      mode: "restored",
      archiveName: archive.name,
      safetyCommit: snapshot.commit,
      safetyTag: snapshot.tag,
      restartRequired: true,
    }
  } finally {
    await rm(workDirectory, { recursive: true, force: true })
  }
}
