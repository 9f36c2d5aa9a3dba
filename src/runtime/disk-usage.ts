import path from "node:path"
import { lstat, readdir } from "node:fs/promises"

export type DiskUsageEntry = {
  name: string
  bytes: number
}

const UNITS = ["B", "K", "M", "G", "T"] as const

/**
 * Human-readable size in the style of `du -h`: binary units, one decimal below 10.
 */
export const formatBytes = (bytes: number): string => {
  let value = bytes
  let unitIndex = 0

  while (value >= 1024 && unitIndex < UNITS.length - 1) {
    value /= 1024
    unitIndex += 1
  }

  if (unitIndex === 0) {
    return `${bytes}B`
  }

  const rounded = value < 10 ? value.toFixed(1) : String(Math.round(value))
  return `${rounded}${UNITS[unitIndex]}`
}

/**
 * Sums apparent file sizes below `directory` without following symlinks.
 */
export const measureDirectory = async (directory: string): Promise<number> => {
  let total = 0

  for (const entry of await readdir(directory, { withFileTypes: true })) {
    const entryPath = path.join(directory, entry.name)

    if (entry.isDirectory()) {
      total += await measureDirectory(entryPath)
    } else {
      total += (await lstat(entryPath)).size
    }
  }

  return total
}

/**
 * Disk usage per top-level directory of the data dir, sorted by name.
 */
export const summarizeDiskUsage = async (dataDir: string): Promise<DiskUsageEntry[]> => {
  const entries = await readdir(dataDir, { withFileTypes: true })
  const directories = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()

  const usage: DiskUsageEntry[] = []
  for (const name of directories) {
    usage.push({ name, bytes: await measureDirectory(path.join(dataDir, name)) })
  }

  return usage
}
