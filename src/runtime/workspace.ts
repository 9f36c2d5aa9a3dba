import path from "node:path"
import { chmod, mkdir } from "node:fs/promises"

import type { StewardConfig, StewardPaths } from "../config/steward-config.js"
import { chownDirectory, type Ownership } from "./ownership.js"

export type WorkspaceDirectory = {
  path: string
  mode: number
}

const SHARED_MODE = 0o750
const PRIVATE_MODE = 0o700

const WORKSPACE_SUBDIRECTORIES = ["data", "config", "logs", "cache", "staging"] as const

/**
 * Keeps the data-directory layout explicit in one place so setup and tests share the same
 * directory contract. Secrets are owner-only.
 *
 * @param config Validated config; optional features add their directories.
 * @param paths Derived locations.
 * @returns Directories to create, parents first.
 */
export const getWorkspaceDirectories = (
  config: Pick<StewardConfig, "hostConfigDir" | "skills">,
  paths: Pick<StewardPaths, "dataDir" | "secretsDir" | "proposalsDir">
): WorkspaceDirectory[] => {
  const directories: WorkspaceDirectory[] = [
    { path: paths.dataDir, mode: SHARED_MODE },
    ...WORKSPACE_SUBDIRECTORIES.map((name) => ({
      path: path.join(paths.dataDir, name),
      mode: SHARED_MODE,
    })),
    { path: paths.secretsDir, mode: PRIVATE_MODE },
  ]

  if (config.hostConfigDir !== null) {
    directories.push({ path: paths.proposalsDir, mode: SHARED_MODE })
  }

  if (config.skills.enable) {
    directories.push(
      { path: path.join(paths.dataDir, "cache", "clawhub"), mode: SHARED_MODE },
      { path: path.join(paths.dataDir, "skills"), mode: SHARED_MODE }
    )
  }

  return directories
}

/**
 * Ensures the layout exists with the expected permissions. Existing directories are
 * re-chmodded so a loosened `secrets` directory is tightened again on the next setup.
 *
 * @param owner Service account every directory is handed to; `null` keeps the caller's.
 * @returns Created or verified directory paths.
 */
export const ensureWorkspaceDirectories = async (
  config: Pick<StewardConfig, "hostConfigDir" | "skills">,
  paths: Pick<StewardPaths, "dataDir" | "secretsDir" | "proposalsDir">,
  owner: Ownership | null = null
): Promise<string[]> => {
  const directories = getWorkspaceDirectories(config, paths)

  for (const directory of directories) {
    await mkdir(directory.path, { recursive: true, mode: directory.mode })
    await chmod(directory.path, directory.mode)
    if (owner) {
      await chownDirectory(directory.path, owner)
    }
  }

  return directories.map((directory) => directory.path)
}
