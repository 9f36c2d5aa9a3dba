import * as tar from "tar"

import { describeError, StewardError } from "../errors.js"

/** Subtrees that never leave the host: volatile output and secrets. */
export const ARCHIVE_EXCLUDED_SEGMENTS: ReadonlySet<string> = new Set(["logs", "cache", "secrets"])
export const ARCHIVE_EXCLUDED_SUFFIX = ".tmp"

/**
 * Matches exclusions against every path segment, not only the top level, the way tar's
 * unanchored `--exclude` patterns do.
 *
 * @param entryPath Entry path relative to the archive root, with or without a leading `./`.
 */
export const isExcludedFromArchive = (entryPath: string): boolean => {
  const segments = entryPath
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment.length > 0 && segment !== ".")

  const baseName = segments.at(-1)
  if (baseName?.endsWith(ARCHIVE_EXCLUDED_SUFFIX)) {
    return true
  }

  return segments.some((segment) => ARCHIVE_EXCLUDED_SEGMENTS.has(segment))
}

export type ArchiveWriter = (sourceDirectory: string, archivePath: string) => Promise<void>
export type ArchiveExtractor = (archivePath: string, targetDirectory: string) => Promise<void>

/**
 * Writes a gzip-compressed tarball of `sourceDirectory`, skipping excluded entries.
 */
export const createArchive: ArchiveWriter = async (sourceDirectory, archivePath) => {
  try {
    await tar.c(
      {
        gzip: true,
        file: archivePath,
        cwd: sourceDirectory,
        portable: true,
        filter: (entryPath) => !isExcludedFromArchive(entryPath),
      },
      ["."]
    )
  } catch (error) {
    throw new StewardError(
      "archive_failed",
      `Cannot archive ${sourceDirectory}: ${describeError(error)}`,
      { cause: error }
    )
  }
}

/**
 * Extracts over `targetDirectory`, replacing existing files. Files are unlinked first so
 * read-only entries such as git objects can be replaced. A failure part-way leaves whatever
 * was already extracted in place; there is no rollback.
 */
export const extractArchive: ArchiveExtractor = async (archivePath, targetDirectory) => {
  try {
    await tar.x({
      file: archivePath,
      cwd: targetDirectory,
      unlink: true,
    })
  } catch (error) {
    throw new StewardError(
      "archive_failed",
      `Cannot extract ${archivePath} into ${targetDirectory}: ${describeError(error)}`,
      { cause: error }
    )
  }
}
