import type { Logger } from "pino"

import { describeError } from "../errors.js"
import { joinRemoteKey, type ObjectStore } from "../storage/object-store.js"
import { BACKUP_KEY_PREFIX, isArchiveName } from "./archive-name.js"

export type RetentionPolicy = {
  /** Most recent archives to keep; `null` keeps everything. */
  count: number | null
}

export type RetentionResult = {
  deleted: string[]
  failedDeletes: string[]
}

/**
 * Picks the archives to delete: everything but the newest `count`, oldest first. Relies on
 * the fixed-width timestamp in archive names for chronological order.
 *
 * @param names Archive names, in any order.
 * @param count Archives to keep, or `null` for unlimited.
 */
export const selectExpiredArchives = (names: string[], count: number | null): string[] => {
  if (count === null || names.length <= count) {
    return []
  }

  const ascending = [...names].sort()
  return ascending.slice(0, ascending.length - count)
}

/**
 * Lists archive objects under the backups prefix, sorted ascending. Objects that do not
 * follow the archive naming convention are ignored.
 */
export const listArchives = async (store: ObjectStore): Promise<string[]> => {
  const names = await store.list(BACKUP_KEY_PREFIX)
  return names.filter(isArchiveName).sort()
}

/**
 * Applies the retention policy to the remote store. Listing failures propagate; a failed
 * delete is logged and skipped, and the next run retries it naturally.
 */
export const enforceRetention = async (
  store: ObjectStore,
  policy: RetentionPolicy,
  logger: Pick<Logger, "info" | "warn">
): Promise<RetentionResult> => {
  if (policy.count === null) {
    return { deleted: [], failedDeletes: [] }
  }

  const expired = selectExpiredArchives(await listArchives(store), policy.count)
  const deleted: string[] = []
  const failedDeletes: string[] = []

  for (const name of expired) {
    try {
      await store.delete(joinRemoteKey(BACKUP_KEY_PREFIX, name))
      deleted.push(name)
    } catch (error) {
      failedDeletes.push(name)
      logger.warn({ archive: name, error: describeError(error) }, "Failed to delete expired backup")
    }
  }

  if (deleted.length > 0) {
    logger.info({ deletedCount: deleted.length, keep: policy.count }, "Expired backups deleted")
  }

  return { deleted, failedDeletes }
}
