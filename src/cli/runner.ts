import type { Logger } from "pino"

import type { StewardCommand } from "./command.js"

type CommandName = StewardCommand["name"]

type CommandOf<Name extends CommandName> = Extract<StewardCommand, { name: Name }>

export type CommandHandlers = {
  [Name in CommandName]: (command: CommandOf<Name>, logger: Logger) => Promise<void>
}

export const runCommand = async (
  command: StewardCommand,
  logger: Logger,
  handlers: CommandHandlers
): Promise<void> => {
  switch (command.name) {
    case "setup":
      return await handlers.setup(command, logger)
    case "render":
      return await handlers.render(command, logger)
    case "commit":
      return await handlers.commit(command, logger)
    case "backup":
      return await handlers.backup(command, logger)
    case "restore":
      return await handlers.restore(command, logger)
    case "status":
      return await handlers.status(command, logger)
    case "logs":
      return await handlers.logs(command, logger)
    case "history":
      return await handlers.history(command, logger)
  }
}
