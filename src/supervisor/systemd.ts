import path from "node:path"
import { mkdir, writeFile } from "node:fs/promises"

import type { JobSchedule } from "../scheduler/job-policy.js"
import type {
  SandboxPolicy,
  ScheduledJobDefinition,
  ServiceDefinition,
  SupervisorPlan,
  SupervisorScope,
} from "./plan.js"

export type UnitFile = {
  fileName: string
  contents: string
}

type Directive = [key: string, value: string]
type Section = [name: string, directives: Directive[]]

const NETWORK_TARGET = "network-online.target"

/**
 * `%` starts a specifier and `$` a variable expansion in both `ExecStart=` and
 * `Environment=`; doubling them makes them literal.
 */
const escapeSpecifiers = (value: string): string => {
  return value.replace(/%/g, "%%").replace(/\$/g, "$$$$")
}

const escapeQuoted = (value: string): string => {
  return escapeSpecifiers(value).replace(/\\/g, "\\\\").replace(/"/g, '\\"')
}

export const quoteExecArgument = (value: string): string => {
  if (value.length > 0 && !/[\s"'\\;]/.test(value)) {
    return escapeSpecifiers(value)
  }

  return `"${escapeQuoted(value)}"`
}

export const formatEnvironmentDirective = (key: string, value: string): string => {
  return `"${escapeQuoted(`${key}=${value}`)}"`
}

const formatBoolean = (value: boolean): string => {
  return value ? "true" : "false"
}

/**
 * Serializes sections in the order given. Keys may repeat; systemd accumulates list-valued
 * directives across lines.
 */
export const renderUnitFile = (sections: Section[]): string => {
  return sections
    .filter(([, directives]) => directives.length > 0)
    .map(([name, directives]) =>
      [`[${name}]`, ...directives.map(([key, value]) => `${key}=${value}`)].join("\n")
    )
    .join("\n\n")
    .concat("\n")
}

const renderSandbox = (sandbox: SandboxPolicy): Directive[] => {
  const directives: Directive[] = []
  const flag = (key: string, value: boolean | undefined): void => {
    if (value !== undefined) {
      directives.push([key, formatBoolean(value)])
    }
  }

  if (sandbox.readOnlySystem) {
    directives.push(["ProtectSystem", "strict"])
  }
  flag("ProtectHome", sandbox.hideHome)
  flag("PrivateTmp", sandbox.privateTmp)

  if (sandbox.kernelHardening) {
    directives.push(
      ["ProtectKernelTunables", "true"],
      ["ProtectKernelModules", "true"],
      ["ProtectKernelLogs", "true"],
      ["ProtectControlGroups", "true"],
      ["ProtectClock", "true"],
      ["ProtectHostname", "true"]
    )
  }

  flag("NoNewPrivileges", sandbox.noNewPrivileges)

  if (sandbox.kernelHardening) {
    directives.push(
      ["LockPersonality", "true"],
      ["RestrictRealtime", "true"],
      ["RestrictSUIDSGID", "true"],
      ["RemoveIPC", "true"],
      // The V8 JIT needs writable and executable pages.
      ["MemoryDenyWriteExecute", "false"],
      ["CapabilityBoundingSet", ""],
      ["AmbientCapabilities", ""],
      ["SystemCallArchitectures", "native"]
    )
  }

  flag("PrivateUsers", sandbox.privateUsers)
  flag("PrivateDevices", sandbox.privateDevices)

  if (sandbox.addressFamilies && sandbox.addressFamilies.length > 0) {
    directives.push(["RestrictAddressFamilies", sandbox.addressFamilies.join(" ")])
  }

  for (const filter of sandbox.systemCallFilter ?? []) {
    directives.push(["SystemCallFilter", filter])
  }

  if (sandbox.readWritePaths && sandbox.readWritePaths.length > 0) {
    directives.push(["ReadWritePaths", sandbox.readWritePaths.map(quoteExecArgument).join(" ")])
  }

  if (sandbox.readOnlyPaths && sandbox.readOnlyPaths.length > 0) {
    directives.push(["ReadOnlyPaths", sandbox.readOnlyPaths.map(quoteExecArgument).join(" ")])
  }

  if (sandbox.deviceAllow && sandbox.deviceAllow.length > 0) {
    directives.push(["DevicePolicy", "auto"])
    for (const device of sandbox.deviceAllow) {
      directives.push(["DeviceAllow", device])
    }
  }

  return directives
}

const defaultTarget = (scope: SupervisorScope): string => {
  return scope === "user" ? "default.target" : "multi-user.target"
}

export const renderServiceUnit = (
  service: ServiceDefinition,
  options: { scope: SupervisorScope; install: boolean }
): string => {
  const unit: Directive[] = [["Description", service.description]]
  if (service.requiresNetwork) {
    unit.push(["After", NETWORK_TARGET], ["Wants", NETWORK_TARGET])
  }
  if (service.restart) {
    unit.push(
      ["StartLimitBurst", String(service.restart.startLimitBurst)],
      ["StartLimitIntervalSec", String(service.restart.startLimitIntervalSec)]
    )
  }

  const body: Directive[] = [
    ["Type", service.kind === "long-running" ? "simple" : "oneshot"],
  ]
  if (service.user) {
    body.push(["User", service.user])
  }
  if (service.group) {
    body.push(["Group", service.group])
  }
  body.push(["ExecStart", service.command.map(quoteExecArgument).join(" ")])
  if (service.restart) {
    body.push(["Restart", "always"], ["RestartSec", String(service.restart.restartSec)])
  }
  if (service.workingDirectory) {
    body.push(["WorkingDirectory", quoteExecArgument(service.workingDirectory)])
  }
  for (const [key, value] of Object.entries(service.environment)) {
    body.push(["Environment", formatEnvironmentDirective(key, value)])
  }
  for (const environmentFile of service.environmentFiles) {
    body.push(["EnvironmentFile", environmentFile])
  }
  if (service.resources) {
    body.push(
      ["LimitNOFILE", String(service.resources.maxFiles)],
      ["MemoryMax", service.resources.maxMemory],
      ["CPUQuota", service.resources.cpuQuota]
    )
  }
  if (service.logIdentifier) {
    body.push(
      ["StandardOutput", "journal"],
      ["StandardError", "journal"],
      ["SyslogIdentifier", service.logIdentifier]
    )
  }
  if (service.sandbox) {
    body.push(...renderSandbox(service.sandbox))
  }

  const install: Directive[] = options.install ? [["WantedBy", defaultTarget(options.scope)]] : []

  return renderUnitFile([
    ["Unit", unit],
    ["Service", body],
    ["Install", install],
  ])
}

export const renderTimerUnit = (description: string, schedule: JobSchedule): string => {
  return renderUnitFile([
    ["Unit", [["Description", description]]],
    [
      "Timer",
      [
        ["OnCalendar", schedule.cadence],
        ["Persistent", formatBoolean(schedule.persistent)],
        ["RandomizedDelaySec", String(schedule.jitterSeconds)],
      ],
    ],
    ["Install", [["WantedBy", "timers.target"]]],
  ])
}

const renderJobUnits = (job: ScheduledJobDefinition, scope: SupervisorScope): UnitFile[] => {
  return [
    {
      fileName: `${job.service.unitName}.service`,
      contents: renderServiceUnit(job.service, { scope, install: false }),
    },
    {
      fileName: `${job.service.unitName}.timer`,
      contents: renderTimerUnit(job.service.description, job.schedule),
    },
  ]
}

/**
 * Renders the plan into systemd unit files: the gateway service first, then a service and
 * timer pair per scheduled job. Job services are started only by their timers.
 *
 * @param plan Compiled supervisor plan.
 * @returns Unit files in a stable order.
 */
export const renderSystemdUnits = (plan: SupervisorPlan): UnitFile[] => {
  return [
    {
      fileName: `${plan.service.unitName}.service`,
      contents: renderServiceUnit(plan.service, { scope: plan.scope, install: true }),
    },
    ...plan.jobs.flatMap((job) => renderJobUnits(job, plan.scope)),
  ]
}

export const writeSystemdUnits = async (
  directory: string,
  units: UnitFile[]
): Promise<string[]> => {
  await mkdir(directory, { recursive: true })

  const written: string[] = []
  for (const unit of units) {
    const target = path.join(directory, unit.fileName)
    await writeFile(target, unit.contents, "utf8")
    written.push(target)
  }

  return written
}
