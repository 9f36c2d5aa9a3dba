import type { HistoryTracker } from "../history/tracker.js"
import type { HistoryEntry } from "../history/version-control.js"
import { describeError } from "../errors.js"
import { GATEWAY_UNIT_NAME } from "../supervisor/plan.js"
import type { ServiceSupervisor } from "../supervisor/service-supervisor.js"
import { formatBytes, summarizeDiskUsage, type DiskUsageEntry } from "./disk-usage.js"

type Section<T> = { ok: true; value: T } | { ok: false; error: string }

export type StatusReport = {
  service: Section<string>
  logs: Section<string>
  logLines: number
  diskUsage: Section<DiskUsageEntry[]>
  /** `null` when history tracking is disabled. */
  history: Section<HistoryEntry[]> | null
  historyLines: number
}

type CollectStatusInput = {
  dataDir: string
  logLines: number
  historyLines: number
  supervisor: ServiceSupervisor
  history: Pick<HistoryTracker, "recentHistory"> | null
}

const capture = async <T>(load: () => Promise<T>): Promise<Section<T>> => {
  try {
    return { ok: true, value: await load() }
  } catch (error) {
    return { ok: false, error: describeError(error) }
  }
}

/**
 * Gathers every status section independently; one failing source never hides the others.
 */
export const collectStatus = async (input: CollectStatusInput): Promise<StatusReport> => {
  const history = input.history

  return {
    service: await capture(() => input.supervisor.status(GATEWAY_UNIT_NAME)),
    logs: await capture(() => input.supervisor.recentLogs(GATEWAY_UNIT_NAME, input.logLines)),
    logLines: input.logLines,
    diskUsage: await capture(() => summarizeDiskUsage(input.dataDir)),
    history: history
      ? await capture(() => history.recentHistory(input.dataDir, input.historyLines))
      : null,
    historyLines: input.historyLines,
  }
}

const renderSection = <T>(section: Section<T>, render: (value: T) => string[]): string[] => {
  if (!section.ok) {
    return [`(unavailable: ${section.error})`]
  }

  return render(section.value)
}

export const formatStatusReport = (report: StatusReport): string => {
  const lines: string[] = [
    "== service ==",
    ...renderSection(report.service, (value) => [value]),
    "",
    `== last ${report.logLines} log lines ==`,
    ...renderSection(report.logs, (value) => [value.length > 0 ? value : "(no log lines)"]),
    "",
    "== disk usage ==",
    ...renderSection(report.diskUsage, (entries) =>
      entries.length > 0
        ? entries.map((entry) => `${formatBytes(entry.bytes)}\t${entry.name}/`)
        : ["(empty)"]
    ),
  ]

  if (report.history) {
    lines.push(
      "",
      `== history (last ${report.historyLines}) ==`,
      ...renderSection(report.history, (entries) =>
        entries.length > 0
          ? entries.map((entry) => `${entry.id.slice(0, 7)} ${entry.subject}`)
          : ["(no commits)"]
      )
    )
  }

  return lines.join("\n")
}
