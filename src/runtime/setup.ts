import path from "node:path"
import { chmod, copyFile } from "node:fs/promises"

import type { Logger } from "pino"

import {
  toModelRegistry,
  type StewardConfig,
  type StewardPaths,
} from "../config/steward-config.js"
import type { HistoryTracker } from "../history/tracker.js"
import { renderModelsDocument, writeModelsDocument } from "../models/registry-renderer.js"
import { compileSupervisorPlan } from "../supervisor/plan.js"
import { renderSystemdUnits, writeSystemdUnits } from "../supervisor/systemd.js"
import { chownTree, type AccountLookup, type Ownership } from "./ownership.js"
import { ensureWorkspaceDirectories } from "./workspace.js"

const JOB_CONFIG_MODE = 0o640

export type SetupResult = {
  directories: string[]
  modelsConfigPath: string
  defaultModel: string | null
  unitFiles: string[]
  historyInitialised: boolean
  /** Deployed config copy for the scheduled jobs; `null` in user scope. */
  jobConfigPath: string | null
  owner: Ownership | null
}

type SetupInput = {
  config: StewardConfig
  configPath: string
  paths: StewardPaths
  history: Pick<HistoryTracker, "ensureRepository"> | null
  accounts: AccountLookup
  logger: Pick<Logger, "info">
}

const deployJobConfig = async (configPath: string, target: string): Promise<void> => {
  if (path.resolve(configPath) !== path.resolve(target)) {
    await copyFile(configPath, target)
  }

  await chmod(target, JOB_CONFIG_MODE)
}

/**
 * Keeps deployment responsibilities in one command: layout, models document, unit files
 * and the history root. In system scope everything written under the data directory is
 * handed to the service account, and the config is copied to where the jobs can read it.
 * Re-running it is safe; the gateway and timers still have to be (re)started through the
 * supervisor to pick up changes.
 *
 * @param input Config, derived paths, history tracker and command logger.
 * @returns Summary of setup outputs for diagnostics and tests.
 */
export const runSetup = async (input: SetupInput): Promise<SetupResult> => {
  const { config, paths, logger } = input

  const systemScope = config.supervisor.scope === "system"
  const owner = systemScope ? await input.accounts.resolve(config.user, config.group) : null

  const directories = await ensureWorkspaceDirectories(config, paths, owner)

  const document = renderModelsDocument(toModelRegistry(config))
  await writeModelsDocument(paths.modelsConfigPath, document)

  const jobConfigPath = systemScope ? paths.jobConfigPath : null
  if (jobConfigPath) {
    await deployJobConfig(input.configPath, jobConfigPath)
  }

  const plan = compileSupervisorPlan({ config, paths, configPath: input.configPath })
  const unitFiles = await writeSystemdUnits(paths.unitDirectory, renderSystemdUnits(plan))

  const historyInitialised = input.history
    ? await input.history.ensureRepository(paths.dataDir)
    : false

  if (owner) {
    const written = [paths.modelsConfigPath, paths.jobConfigPath]
    if (input.history) {
      written.push(path.join(paths.dataDir, ".git"), path.join(paths.dataDir, ".gitignore"))
    }

    for (const target of written) {
      await chownTree(target, owner)
    }
  }

  logger.info(
    {
      command: "setup",
      dataDir: paths.dataDir,
      modelsConfigPath: paths.modelsConfigPath,
      defaultModel: document.defaultModel,
      unitDirectory: paths.unitDirectory,
      unitCount: unitFiles.length,
      historyInitialised,
      jobConfigPath,
      owner,
    },
    "Setup completed"
  )

  return {
    directories,
    modelsConfigPath: paths.modelsConfigPath,
    defaultModel: document.defaultModel,
    unitFiles,
    historyInitialised,
    jobConfigPath,
    owner,
  }
}
