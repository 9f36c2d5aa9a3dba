import { Command, CommanderError, InvalidArgumentError } from "commander"

import { getAppVersion } from "../version.js"

export type RenderTarget = "models" | "units"

export type StewardCommand =
  | { name: "setup" }
  | { name: "render"; target: RenderTarget; output: string | null }
  | { name: "commit" }
  | { name: "backup"; viaSupervisor: boolean }
  | { name: "restore"; archiveName: string | null }
  | { name: "status" }
  | { name: "logs"; follow: boolean; lines: number | null }
  | { name: "history"; args: string[] }

export type ParsedInvocation =
  | { kind: "command"; command: StewardCommand; configPath: string | null }
  | { kind: "exit" }

const RENDER_TARGETS = ["models", "units"] as const

const parseRenderTarget = (value: string): RenderTarget => {
  const target = RENDER_TARGETS.find((candidate) => candidate === value)
  if (!target) {
    throw new InvalidArgumentError(
      `Unknown render target: ${value}. Valid targets: ${RENDER_TARGETS.join(", ")}`
    )
  }

  return target
}

const parsePositiveInteger = (value: string): number => {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got: ${value}`)
  }

  return parsed
}

/**
 * Centralizes command validation in one parser so every operator command and scheduled job
 * goes through the same checks. With no subcommand, `status` runs.
 *
 * @param argv Raw user arguments from process argv.
 * @returns Parsed command with the optional global config path, or `exit` after help or
 *   version output.
 */
export const parseCommand = (argv: string[]): ParsedInvocation => {
  const selection: { command: StewardCommand | null } = { command: null }
  const select = (command: StewardCommand): void => {
    selection.command = command
  }

  const parser = new Command("openclaw-steward")

  parser
    .exitOverride()
    .enablePositionalOptions()
    .allowExcessArguments(false)
    .version(getAppVersion())
    .option("--config <path>", "config file (default: ~/.config/openclaw-steward/config.jsonc)")

  parser
    .command("setup")
    .description("create the data layout, models document, unit files and history root")
    .action(() => select({ name: "setup" }))

  parser
    .command("render")
    .description("print or write the models document or the unit files")
    .argument("<target>", "models | units", parseRenderTarget)
    .option("--output <path>", "write to this file (models) or directory (units)")
    .action((target: RenderTarget, options: { output?: string }) =>
      select({ name: "render", target, output: options.output ?? null })
    )

  parser
    .command("commit")
    .description("commit data directory changes to the history")
    .action(() => select({ name: "commit" }))

  parser
    .command("backup")
    .description("archive the data directory to remote storage and apply retention")
    .option("--via-supervisor", "start the scheduled backup unit instead of running in-process")
    .action((options: { viaSupervisor?: boolean }) =>
      select({ name: "backup", viaSupervisor: options.viaSupervisor === true })
    )

  parser
    .command("restore")
    .description("list backups, or restore the named one over the data directory")
    .argument("[archive]", "backup file name")
    .action((archive: string | undefined) =>
      select({ name: "restore", archiveName: archive ?? null })
    )

  parser
    .command("status", { isDefault: true })
    .description("show service health, recent logs, disk usage and history")
    .action(() => select({ name: "status" }))

  parser
    .command("logs")
    .description("print or follow the gateway log")
    .option("-f, --follow", "stream new log lines")
    .option("-n, --lines <count>", "number of lines", parsePositiveInteger)
    .action((options: { follow?: boolean; lines?: number }) =>
      select({ name: "logs", follow: options.follow === true, lines: options.lines ?? null })
    )

  parser
    .command("history")
    .description("run git against the data directory")
    .argument("[args...]", "git arguments")
    .allowUnknownOption()
    .passThroughOptions()
    .action((args: string[]) => select({ name: "history", args }))

  try {
    parser.parse(argv, { from: "user" })
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.exitCode === 0) {
        return { kind: "exit" }
      }

      throw new Error(error.message)
    }

    if (error instanceof Error) {
      throw error
    }

    throw new Error("Unknown command parsing error")
  }

  const command = selection.command
  if (command === null) {
    throw new Error("No command selected")
  }

  const options = parser.opts<{ config?: string }>()

  return {
    kind: "command",
    command,
    configPath: options.config ?? null,
  }
}
