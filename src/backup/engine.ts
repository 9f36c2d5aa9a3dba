import { tmpdir } from "node:os"
import path from "node:path"
import { mkdtemp, rm } from "node:fs/promises"

import type { Logger } from "pino"

import { describeError } from "../errors.js"
import type { HistoryTracker } from "../history/tracker.js"
import type { ObjectStore } from "../storage/object-store.js"
import { createArchive, type ArchiveWriter } from "./archive.js"
import { formatArchiveName, toBackupArchive } from "./archive-name.js"
import { enforceRetention, type RetentionPolicy } from "./retention.js"

export type BackupRequest = {
  dataDir: string
  destination: ObjectStore
  retention: RetentionPolicy
}

export type BackupDependencies = {
  /** `null` when history tracking is disabled. */
  history: Pick<HistoryTracker, "commitIfChanged"> | null
  logger: Pick<Logger, "info" | "warn">
  now?: () => Date
  temporaryRoot?: string
  writeArchive?: ArchiveWriter
}

export type BackupResult = {
  archiveName: string
  remoteKey: string
  commitId: string | null
  deleted: string[]
  failedDeletes: string[]
}

/**
 * Best-effort snapshot before packaging: a failed commit is logged and the archive is still
 * produced from whatever is on disk.
 */
const commitBeforeBackup = async (
  dependencies: BackupDependencies,
  dataDir: string
): Promise<string | null> => {
  if (!dependencies.history) {
    return null
  }

  try {
    const result = await dependencies.history.commitIfChanged(dataDir)
    return result.committed ? result.commitId : null
  } catch (error) {
    dependencies.logger.warn(
      { dataDir, error: describeError(error) },
      "History commit before backup failed; continuing"
    )
    return null
  }
}

/**
 * Runs one backup: commit, archive, upload, then prune old archives. Strictly sequential.
 * The local archive is removed whether or not the upload succeeds, and retention only runs
 * after a successful upload, so a failed run never shrinks the retained set. Upload
 * failures propagate; the next scheduled run is the retry.
 *
 * @param request Data directory, remote store and retention policy.
 * @param dependencies History tracker, logger and test seams.
 */
export const runBackup = async (
  request: BackupRequest,
  dependencies: BackupDependencies
): Promise<BackupResult> => {
  const now = dependencies.now ?? (() => new Date())
  const writeArchive = dependencies.writeArchive ?? createArchive

  const commitId = await commitBeforeBackup(dependencies, request.dataDir)
  const archive = toBackupArchive(formatArchiveName(now()))

  const workDirectory = await mkdtemp(
    path.join(dependencies.temporaryRoot ?? tmpdir(), "openclaw-backup-")
  )

  try {
    const archivePath = path.join(workDirectory, archive.name)
    await writeArchive(request.dataDir, archivePath)
    await request.destination.upload(archivePath, archive.remoteKey)
  } finally {
    await rm(workDirectory, { recursive: true, force: true })
  }

  dependencies.logger.info(
    { archive: archive.name, remoteKey: archive.remoteKey },
    "Backup uploaded"
  )

  const retention = await enforceRetention(
    request.destination,
    request.retention,
    dependencies.logger
  )

  return {
    archiveName: archive.name,
    remoteKey: archive.remoteKey,
    commitId,
    deleted: retention.deleted,
    failedDeletes: retention.failedDeletes,
  }
}
