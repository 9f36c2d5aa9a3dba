export type DiffStat = {
  filesChanged: number
  insertions: number
  deletions: number
}

export type HistoryEntry = {
  id: string
  committedAt: string
  subject: string
}

export type CommitIdentity = {
  name: string
  email: string
}

/**
 * What the history tracker needs from a version-control tool. The working directory is always
 * passed explicitly; implementations hold no per-repository state.
 */
export type VersionControl = {
  isRepository: (directory: string) => Promise<boolean>
  initialize: (directory: string, identity: CommitIdentity) => Promise<void>
  stageAll: (directory: string) => Promise<void>
  /** Staged changes against the last commit, or `null` when nothing is staged. */
  stagedDiffStat: (directory: string) => Promise<DiffStat | null>
  commit: (directory: string, message: string, options?: { allowEmpty?: boolean }) => Promise<string>
  tag: (directory: string, name: string, commitId: string) => Promise<void>
  hasTag: (directory: string, name: string) => Promise<boolean>
  /** Id of the commit the working tree is on. */
  resolveHead: (directory: string) => Promise<string>
  log: (directory: string, limit: number) => Promise<HistoryEntry[]>
  /** Runs raw tool arguments with the terminal attached; resolves with the exit code. */
  passthrough: (directory: string, args: string[]) => Promise<number>
}

const pluralize = (count: number, singular: string, plural: string): string => {
  return `${count} ${count === 1 ? singular : plural}`
}

export const formatDiffStat = (stat: DiffStat): string => {
  return [
    pluralize(stat.filesChanged, "file changed", "files changed"),
    pluralize(stat.insertions, "insertion(+)", "insertions(+)"),
    pluralize(stat.deletions, "deletion(-)", "deletions(-)"),
  ].join(", ")
}
