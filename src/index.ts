#!/usr/bin/env node
import { parseCommand } from "./cli/command.js"
import { runCommand } from "./cli/runner.js"
import { resolveStorageCredentials } from "./config/credentials.js"
import {
  loadStewardConfig,
  resolveStewardConfigPath,
  resolveStewardPaths,
} from "./config/steward-config.js"
import { describeError, isStewardError, resolveExitCode } from "./errors.js"
import { createGitVersionControl } from "./history/git.js"
import { createHistoryTracker } from "./history/tracker.js"
import { createComponentLogger, logger } from "./logging/logger.js"
import { createProcessRunner } from "./process/runner.js"
import { createCommandHandlers } from "./runtime/commands.js"
import { createAccountLookup } from "./runtime/ownership.js"
import { createRcloneObjectStore } from "./storage/rclone.js"
import { createSystemdSupervisor } from "./supervisor/service-supervisor.js"
import { getAppVersion } from "./version.js"

const main = async (): Promise<void> => {
  const invocation = parseCommand(process.argv.slice(2))
  if (invocation.kind === "exit") {
    return
  }

  const { command } = invocation
  const commandLogger = createComponentLogger(command.name)
  commandLogger.debug({ version: getAppVersion() }, "Command started")

  const configPath = resolveStewardConfigPath({ explicitPath: invocation.configPath ?? undefined })
  const { config } = await loadStewardConfig(configPath)
  const paths = resolveStewardPaths(config)

  const runner = createProcessRunner()
  const versionControl = createGitVersionControl(runner)
  const history = config.history.enable
    ? createHistoryTracker({ versionControl, logger: createComponentLogger("history") })
    : null

  const handlers = createCommandHandlers({
    config,
    configPath,
    paths,
    supervisor: createSystemdSupervisor(runner, config.supervisor.scope),
    accounts: createAccountLookup(runner),
    versionControl,
    history,
    openDestination: async () =>
      createRcloneObjectStore({
        runner,
        credentials: await resolveStorageCredentials(config),
      }),
    streams: { stdout: console, stderr: console },
  })

  await runCommand(command, commandLogger, handlers)
}

main().catch((error: unknown) => {
  logger.error(
    {
      code: isStewardError(error) ? error.code : undefined,
      error: describeError(error),
    },
    "openclaw-steward failed"
  )
  process.exitCode = resolveExitCode(error)
})
