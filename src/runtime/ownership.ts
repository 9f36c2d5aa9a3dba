import path from "node:path"
import { chown, lchown, lstat, readdir } from "node:fs/promises"

import { configurationError, isStewardError } from "../errors.js"
import type { ProcessRunner } from "../process/runner.js"

export type Ownership = {
  uid: number
  gid: number
}

export type AccountLookup = {
  resolve: (user: string, group: string) => Promise<Ownership>
}

const parseNumericId = (value: string): number | null => {
  const trimmed = value.trim()
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null
}

/**
 * Reads the gid from a `getent group` line such as `openclaw:x:990:`.
 */
export const parseGroupEntry = (line: string): number | null => {
  const [, , gid = ""] = line.trim().split(":")
  return parseNumericId(gid)
}

/**
 * Resolves the service account through `id` and `getent`, which read the same account
 * database the supervisor uses for `User=` and `Group=`.
 *
 * @param runner Process runner used to query the account database.
 */
export const createAccountLookup = (runner: ProcessRunner): AccountLookup => {
  const query = async (field: string, name: string, command: string, args: string[]) => {
    try {
      const result = await runner.run({ command, args })
      return result.stdout
    } catch (error) {
      if (isStewardError(error) && error.code === "process_failed") {
        throw configurationError(field, `cannot resolve '${name}': ${error.message}`)
      }

      throw error
    }
  }

  return {
    resolve: async (user, group) => {
      const uid = parseNumericId(await query("user", user, "id", ["-u", user]))
      if (uid === null) {
        throw configurationError("user", `cannot resolve '${user}' to a numeric id`)
      }

      const gid = parseGroupEntry(await query("group", group, "getent", ["group", group]))
      if (gid === null) {
        throw configurationError("group", `cannot resolve '${group}' to a numeric id`)
      }

      return { uid, gid }
    },
  }
}

export const chownDirectory = async (directory: string, owner: Ownership): Promise<void> => {
  await chown(directory, owner.uid, owner.gid)
}

/**
 * Hands `target` and everything below it to `owner`. Symlinks are re-owned, not followed.
 * A missing target is skipped.
 */
export const chownTree = async (target: string, owner: Ownership): Promise<void> => {
  let isDirectory: boolean
  try {
    isDirectory = (await lstat(target)).isDirectory()
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return
    }

    throw error
  }

  await lchown(target, owner.uid, owner.gid)
  if (!isDirectory) {
    return
  }

  for (const entry of await readdir(target)) {
    await chownTree(path.join(target, entry), owner)
  }
}
