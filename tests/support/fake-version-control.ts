import type { DiffStat, HistoryEntry, VersionControl } from "../../src/history/version-control.js"

export type FakeCommit = {
  id: string
  message: string
}

export type FakeVersionControl = VersionControl & {
  commits: FakeCommit[]
  tags: Map<string, string>
  /** What the next `stagedDiffStat` reports; consumed by `commit`. */
  pendingChanges: DiffStat | null
  events: string[]
}

/**
 * Version control kept entirely in memory. Tests mark the working tree dirty through
 * `pendingChanges` instead of touching a real repository.
 */
export const createFakeVersionControl = (): FakeVersionControl => {
  const repositories = new Set<string>()

  const vcs: FakeVersionControl = {
    commits: [],
    tags: new Map(),
    pendingChanges: null,
    events: [],
    isRepository: async (directory) => repositories.has(directory),
    initialize: async (directory) => {
      vcs.events.push("initialize")
      repositories.add(directory)
    },
    stageAll: async () => {
      vcs.events.push("stage")
    },
    stagedDiffStat: async () => vcs.pendingChanges,
    commit: async (_directory, message, options) => {
      if (vcs.pendingChanges === null && options?.allowEmpty !== true) {
        throw new Error("nothing to commit")
      }

      const id = `${String(vcs.commits.length + 1).padStart(7, "0")}abcdef`
      vcs.commits.push({ id, message })
      vcs.pendingChanges = null
      vcs.events.push(`commit ${message}`)
      return id
    },
    tag: async (_directory, name, commitId) => {
      if (vcs.tags.has(name)) {
        throw new Error(`tag '${name}' already exists`)
      }

      vcs.tags.set(name, commitId)
      vcs.events.push(`tag ${name}`)
    },
    hasTag: async (_directory, name) => vcs.tags.has(name),
    resolveHead: async () => {
      const head = vcs.commits.at(-1)
      if (!head) {
        throw new Error("no commits yet")
      }

      return head.id
    },
    log: async (_directory, limit): Promise<HistoryEntry[]> => {
      return [...vcs.commits]
        .reverse()
        .slice(0, limit)
        .map((commit) => ({
          id: commit.id,
          committedAt: "2026-10-18T12:00:00Z",
          subject: commit.message,
        }))
    },
    passthrough: async (_directory, args) => {
      vcs.events.push(`passthrough ${args.join(" ")}`)
      return 0
    },
  }

  return vcs
}
