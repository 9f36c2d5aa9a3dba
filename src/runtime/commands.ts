import { runBackup } from "../backup/engine.js"
import { runRestore } from "../backup/restore.js"
import type { CommandHandlers } from "../cli/runner.js"
import {
  toModelRegistry,
  type StewardConfig,
  type StewardPaths,
} from "../config/steward-config.js"
import { configurationError, StewardError } from "../errors.js"
import type { HistoryTracker } from "../history/tracker.js"
import type { VersionControl } from "../history/version-control.js"
import {
  renderModelsDocument,
  serializeModelsDocument,
  writeModelsDocument,
} from "../models/registry-renderer.js"
import type { ObjectStore } from "../storage/object-store.js"
import { compileSupervisorPlan, GATEWAY_UNIT_NAME, JOB_UNIT_NAMES } from "../supervisor/plan.js"
import type { ServiceSupervisor } from "../supervisor/service-supervisor.js"
import { renderSystemdUnits, writeSystemdUnits } from "../supervisor/systemd.js"
import type { AccountLookup } from "./ownership.js"
import { runSetup } from "./setup.js"
import { collectStatus, formatStatusReport } from "./status.js"

export type CliStreams = {
  stdout: Pick<Console, "log">
  stderr: Pick<Console, "error">
}

export type CommandContext = {
  config: StewardConfig
  configPath: string
  paths: StewardPaths
  supervisor: ServiceSupervisor
  accounts: AccountLookup
  versionControl: Pick<VersionControl, "passthrough">
  /** `null` when history tracking is disabled. */
  history: HistoryTracker | null
  /** Resolves credentials lazily; only backup and restore need the remote store. */
  openDestination: () => Promise<ObjectStore>
  streams: CliStreams
}

const requireHistory = (history: HistoryTracker | null): HistoryTracker => {
  if (!history) {
    throw configurationError("history.enable", "history tracking is disabled")
  }

  return history
}

/**
 * Binds every CLI command to the loaded config and the host capabilities. Handlers print
 * operator-facing output to stdout; structured records go through the logger.
 *
 * @param context Config, derived paths, capabilities and output streams.
 * @returns One handler per command.
 */
export const createCommandHandlers = (context: CommandContext): CommandHandlers => {
  const { config, paths, supervisor, streams } = context

  return {
    setup: async (_command, logger) => {
      const result = await runSetup({
        config,
        configPath: context.configPath,
        paths,
        history: context.history,
        accounts: context.accounts,
        logger,
      })

      streams.stdout.log(`models: ${result.modelsConfigPath} (default: ${result.defaultModel ?? "none"})`)
      streams.stdout.log(`units: ${result.unitFiles.length} written to ${paths.unitDirectory}`)
      if (result.jobConfigPath) {
        streams.stdout.log(`job config: ${result.jobConfigPath}`)
      }
      if (result.historyInitialised) {
        streams.stdout.log(`history: initialised in ${paths.dataDir}`)
      }
    },

    render: async (command, logger) => {
      if (command.target === "models") {
        const document = renderModelsDocument(toModelRegistry(config))

        if (command.output) {
          await writeModelsDocument(command.output, document)
          logger.info({ output: command.output }, "Models document written")
          return
        }

        streams.stdout.log(serializeModelsDocument(document).trimEnd())
        return
      }

      const units = renderSystemdUnits(
        compileSupervisorPlan({ config, paths, configPath: context.configPath })
      )

      if (command.output) {
        const written = await writeSystemdUnits(command.output, units)
        logger.info({ output: command.output, unitCount: written.length }, "Unit files written")
        return
      }

      streams.stdout.log(
        units.map((unit) => `# ${unit.fileName}\n${unit.contents.trimEnd()}`).join("\n\n")
      )
    },

    commit: async () => {
      const result = await requireHistory(context.history).commitIfChanged(paths.dataDir)

      streams.stdout.log(
        result.committed ? `${result.commitId.slice(0, 7)} ${result.message}` : "no changes"
      )
    },

    backup: async (command, logger) => {
      if (command.viaSupervisor) {
        if (!config.backup.enable) {
          throw configurationError("backup.enable", "the scheduled backup job is not installed")
        }

        await supervisor.start(JOB_UNIT_NAMES.backup)
        streams.stdout.log(
          await supervisor.recentLogs(JOB_UNIT_NAMES.backup, config.tuning.status.logLines)
        )
        return
      }

      const result = await runBackup(
        {
          dataDir: paths.dataDir,
          destination: await context.openDestination(),
          retention: { count: config.backup.retentionCount },
        },
        { history: context.history, logger }
      )

      streams.stdout.log(`uploaded ${result.remoteKey}`)
      if (result.deleted.length > 0) {
        streams.stdout.log(`pruned ${result.deleted.length} old backup(s)`)
      }
      for (const name of result.failedDeletes) {
        streams.stderr.error(`could not delete ${name}; it will be retried on the next run`)
      }
    },

    restore: async (command, logger) => {
      const result = await runRestore(
        {
          dataDir: paths.dataDir,
          destination: await context.openDestination(),
          archiveName: command.archiveName,
        },
        { history: context.history, logger }
      )

      if (result.mode === "list") {
        streams.stdout.log("Available backups:")
        for (const name of result.archives.length > 0 ? result.archives : ["(none)"]) {
          streams.stdout.log(`  ${name}`)
        }
        streams.stdout.log("Usage: openclaw-steward restore <archive>")
        return
      }

      if (result.safetyTag) {
        streams.stdout.log(`previous state tagged ${result.safetyTag} in the history`)
      }
      streams.stdout.log(
        `restored from ${result.archiveName}; restart ${GATEWAY_UNIT_NAME} to apply`
      )
    },

    status: async () => {
      const report = await collectStatus({
        dataDir: paths.dataDir,
        logLines: config.tuning.status.logLines,
        historyLines: config.tuning.status.historyLines,
        supervisor,
        history: context.history,
      })

      streams.stdout.log(formatStatusReport(report))
    },

    logs: async (command) => {
      const lines = command.lines ?? config.tuning.status.logLines

      if (!command.follow) {
        streams.stdout.log(await supervisor.recentLogs(GATEWAY_UNIT_NAME, lines))
        return
      }

      const exitCode = await supervisor.followLogs(GATEWAY_UNIT_NAME, lines)
      if (exitCode !== 0) {
        throw new StewardError("process_failed", `Log stream exited with code ${exitCode}`)
      }
    },

    history: async (command) => {
      requireHistory(context.history)

      const exitCode = await context.versionControl.passthrough(paths.dataDir, command.args)
      if (exitCode !== 0) {
        throw new StewardError(
          "process_failed",
          `history ${command.args.join(" ")} exited with code ${exitCode}`
        )
      }
    },
  }
}
