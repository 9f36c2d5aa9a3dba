import type { ProcessRunner } from "../process/runner.js"
import type { SupervisorScope } from "./plan.js"

/**
 * The operator-facing slice of the host supervisor. Lifecycle, restart policy and timers
 * stay with the supervisor; this is only what the CLI asks of it.
 */
export type ServiceSupervisor = {
  status: (unitName: string) => Promise<string>
  recentLogs: (unitName: string, lines: number) => Promise<string>
  /** Streams the unit log to the terminal until interrupted; resolves with the exit code. */
  followLogs: (unitName: string, lines: number) => Promise<number>
  start: (unitName: string) => Promise<void>
}

/** `systemctl status` exits 3 for an inactive unit, which is still a valid answer. */
const SYSTEMCTL_STATUS_INACTIVE = [1, 2, 3, 4]

const toUnit = (unitName: string): string => {
  return unitName.includes(".") ? unitName : `${unitName}.service`
}

export const createSystemdSupervisor = (
  runner: ProcessRunner,
  scope: SupervisorScope
): ServiceSupervisor => {
  const scopeArgs = scope === "user" ? ["--user"] : []

  return {
    status: async (unitName) => {
      const result = await runner.run({
        command: "systemctl",
        args: [...scopeArgs, "status", toUnit(unitName), "--no-pager"],
        acceptExitCodes: SYSTEMCTL_STATUS_INACTIVE,
      })
      return result.stdout.trimEnd()
    },
    recentLogs: async (unitName, lines) => {
      const result = await runner.run({
        command: "journalctl",
        args: [...scopeArgs, "--unit", toUnit(unitName), "--lines", String(lines), "--no-pager"],
      })
      return result.stdout.trimEnd()
    },
    followLogs: async (unitName, lines) => {
      return await runner.runAttached({
        command: "journalctl",
        args: [...scopeArgs, "--unit", toUnit(unitName), "--lines", String(lines), "--follow"],
      })
    },
    start: async (unitName) => {
      await runner.run({
        command: "systemctl",
        args: [...scopeArgs, "start", toUnit(unitName)],
      })
    },
  }
}
