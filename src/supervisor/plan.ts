import path from "node:path"

import type { StewardConfig, StewardPaths } from "../config/steward-config.js"
import { resolveJobPolicies, type JobName, type JobSchedule } from "../scheduler/job-policy.js"

export type SupervisorScope = "system" | "user"

/**
 * Host-independent sandbox policy. Unset fields are left to the supervisor's defaults.
 */
export type SandboxPolicy = {
  readOnlySystem?: boolean
  hideHome?: boolean
  privateTmp?: boolean
  privateDevices?: boolean
  privateUsers?: boolean
  noNewPrivileges?: boolean
  /** Kernel, clock, hostname and capability lockdown applied to the long-running gateway. */
  kernelHardening?: boolean
  addressFamilies?: string[]
  systemCallFilter?: string[]
  readWritePaths?: string[]
  readOnlyPaths?: string[]
  deviceAllow?: string[]
}

export type RestartPolicy = {
  restartSec: number
  startLimitBurst: number
  startLimitIntervalSec: number
}

export type ResourceLimits = {
  maxMemory: string
  maxFiles: number
  cpuQuota: string
}

export type ServiceDefinition = {
  unitName: string
  description: string
  kind: "long-running" | "one-shot"
  command: string[]
  requiresNetwork: boolean
  user: string | null
  group: string | null
  workingDirectory: string | null
  environment: Record<string, string>
  environmentFiles: string[]
  restart: RestartPolicy | null
  resources: ResourceLimits | null
  sandbox: SandboxPolicy | null
  logIdentifier: string | null
}

export type ScheduledJobDefinition = {
  name: JobName
  service: ServiceDefinition
  schedule: JobSchedule
}

export type SupervisorPlan = {
  scope: SupervisorScope
  service: ServiceDefinition
  jobs: ScheduledJobDefinition[]
}

type CompilePlanInput = {
  config: StewardConfig
  paths: StewardPaths
  /** Config path the scheduled jobs are pointed at in user scope. */
  configPath: string
}

export const GATEWAY_UNIT_NAME = "openclaw-gateway"

export const JOB_UNIT_NAMES: Record<JobName, string> = {
  historyCommit: "openclaw-history",
  backup: "openclaw-backup",
}

const JOB_DESCRIPTIONS: Record<JobName, string> = {
  historyCommit: "Auto-commit OpenClaw data changes",
  backup: "Backup OpenClaw data to S3-compatible storage",
}

const JOB_SUBCOMMANDS: Record<JobName, string> = {
  historyCommit: "commit",
  backup: "backup",
}

const GATEWAY_ADDRESS_FAMILIES = ["AF_INET", "AF_INET6", "AF_UNIX", "AF_NETLINK"]
const GATEWAY_SYSTEM_CALL_FILTER = ["@system-service", "~@mount", "~@reboot", "~@swap"]
const ROCM_DEVICES = ["/dev/kfd rw", "/dev/dri/card0 rw", "/dev/dri/renderD128 rw"]

/**
 * Environment handed to the gateway. Later entries win, so `extraEnvironment` can override
 * anything derived from the config.
 */
export const buildGatewayEnvironment = (
  config: StewardConfig,
  paths: StewardPaths
): Record<string, string> => {
  const environment: Record<string, string> = {
    NODE_ENV: "production",
    OPENCLAW_STATE_DIR: paths.dataDir,
    OPENCLAW_GATEWAY_HOST: config.network.host,
    OPENCLAW_GATEWAY_PORT: String(config.network.port),
    OPENCLAW_MODELS_CONFIG: paths.modelsConfigPath,
    HOME: paths.dataDir,
  }

  if (config.rocm.enable) {
    environment.HSA_OVERRIDE_GFX_VERSION = config.rocm.gfxVersion
    environment.HIP_VISIBLE_DEVICES = config.rocm.deviceIds.join(",")
  }

  if (config.hostConfigDir !== null) {
    environment.OPENCLAW_HOST_CONFIG_DIR = config.hostConfigDir
    environment.OPENCLAW_HOST_PROPOSALS_DIR = paths.proposalsDir
  }

  if (config.skills.enable) {
    environment.CLAWHUB_CACHE_DIR = path.join(paths.dataDir, "cache", "clawhub")
  }

  return { ...environment, ...config.extraEnvironment }
}

const buildGatewaySandbox = (config: StewardConfig, paths: StewardPaths): SandboxPolicy => {
  return {
    readOnlySystem: true,
    hideHome: true,
    privateTmp: true,
    noNewPrivileges: true,
    kernelHardening: true,
    privateUsers: !config.rocm.enable,
    privateDevices: !config.rocm.enable,
    addressFamilies: GATEWAY_ADDRESS_FAMILIES,
    systemCallFilter: GATEWAY_SYSTEM_CALL_FILTER,
    readWritePaths: [paths.dataDir, ...config.sandbox.extraWritePaths],
    readOnlyPaths: [
      ...(config.hostConfigDir !== null ? [config.hostConfigDir] : []),
      ...config.sandbox.extraReadPaths,
    ],
    ...(config.rocm.enable ? { deviceAllow: ROCM_DEVICES } : {}),
  }
}

const buildJobSandbox = (paths: StewardPaths): SandboxPolicy => {
  // Both jobs write the history repository inside the data dir; the backup archive goes to
  // the private tmp.
  return {
    readOnlySystem: true,
    hideHome: true,
    privateTmp: true,
    privateDevices: true,
    noNewPrivileges: true,
    readWritePaths: [paths.dataDir],
  }
}

/**
 * Compiles the validated config into the set of units the supervisor manages: the
 * long-running gateway plus one scheduled one-shot per enabled job. User scope drops the
 * identity and sandbox settings, which a per-user service manager cannot apply.
 *
 * @param input Config, derived paths and the config path jobs are started with.
 * @returns Host-independent supervisor plan.
 */
export const compileSupervisorPlan = ({
  config,
  paths,
  configPath,
}: CompilePlanInput): SupervisorPlan => {
  const scope = config.supervisor.scope
  const systemScope = scope === "system"
  // System-scope jobs run as the service user with the home directories hidden.
  const jobConfigPath = systemScope ? paths.jobConfigPath : configPath

  const service: ServiceDefinition = {
    unitName: GATEWAY_UNIT_NAME,
    description: "OpenClaw AI Gateway",
    kind: "long-running",
    command: [config.gateway.executable],
    requiresNetwork: true,
    user: systemScope ? config.user : null,
    group: systemScope ? config.group : null,
    workingDirectory: paths.dataDir,
    environment: buildGatewayEnvironment(config, paths),
    environmentFiles: config.environmentFiles,
    restart: {
      restartSec: config.tuning.restart.restartSec,
      startLimitBurst: config.tuning.restart.limitBurst,
      startLimitIntervalSec: config.tuning.restart.limitIntervalSec,
    },
    resources: { ...config.tuning.resources },
    sandbox: systemScope && config.sandbox.enable ? buildGatewaySandbox(config, paths) : null,
    logIdentifier: "openclaw",
  }

  const jobs = resolveJobPolicies(config)
    .filter((policy) => policy.enabled)
    .map((policy): ScheduledJobDefinition => {
      const isBackup = policy.name === "backup"

      return {
        name: policy.name,
        schedule: policy.schedule,
        service: {
          unitName: JOB_UNIT_NAMES[policy.name],
          description: JOB_DESCRIPTIONS[policy.name],
          kind: "one-shot",
          command: [
            config.supervisor.stewardExecutable,
            "--config",
            jobConfigPath,
            JOB_SUBCOMMANDS[policy.name],
          ],
          requiresNetwork: isBackup,
          user: systemScope ? config.user : null,
          group: systemScope ? config.group : null,
          workingDirectory: null,
          environment: { NODE_ENV: "production" },
          environmentFiles: isBackup ? config.environmentFiles : [],
          restart: null,
          resources: null,
          sandbox: systemScope ? buildJobSandbox(paths) : null,
          logIdentifier: null,
        },
      }
    })

  return {
    scope,
    service,
    jobs,
  }
}
