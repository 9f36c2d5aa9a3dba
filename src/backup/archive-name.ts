export const ARCHIVE_PREFIX = "openclaw"
export const ARCHIVE_EXTENSION = "tar.gz"
export const BACKUP_KEY_PREFIX = "backups"

const ARCHIVE_NAME_PATTERN = /^openclaw-\d{8}-\d{6}\.tar\.gz$/

export type BackupArchive = {
  name: string
  remoteKey: string
}

const pad = (value: number, width = 2): string => {
  return String(value).padStart(width, "0")
}

/** `YYYYMMDD-HHMMSS` in UTC. */
export const formatUtcStamp = (date: Date): string => {
  const day = `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`

  return `${day}-${time}`
}

/**
 * Fixed-width, zero-padded UTC timestamp, so names sort lexicographically in creation order.
 * Retention depends on that ordering.
 *
 * @param date Creation time.
 * @returns Name such as `openclaw-20261018-142500.tar.gz`.
 */
export const formatArchiveName = (date: Date): string => {
  return `${ARCHIVE_PREFIX}-${formatUtcStamp(date)}.${ARCHIVE_EXTENSION}`
}

export const isArchiveName = (name: string): boolean => {
  return ARCHIVE_NAME_PATTERN.test(name)
}

export const toBackupArchive = (name: string): BackupArchive => {
  return {
    name,
    remoteKey: `${BACKUP_KEY_PREFIX}/${name}`,
  }
}
