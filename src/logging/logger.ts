import pino, { type Logger } from "pino"

import { buildLoggerOptions, LOG_DESTINATION_FD, resolveRuntimeEnv } from "./options.js"

type CreateLoggerInput = {
  env?: "development" | "test" | "production"
  logLevel?: string
  serviceName?: string
  prettyLogs?: boolean
}

/**
 * Creates logger instances from one shared policy surface so every command emits
 * consistent metadata and formatting.
 *
 * @param input Optional logger overrides for embedding and tests.
 * @returns Configured Pino logger writing to stderr.
 */
export const createLogger = (input: CreateLoggerInput = {}): Logger => {
  const env = input.env ?? resolveRuntimeEnv()
  const logLevel = input.logLevel ?? (process.env.OPENCLAW_STEWARD_LOG_LEVEL?.trim() || undefined)
  const prettyLogs = input.prettyLogs ?? process.env.OPENCLAW_STEWARD_PRETTY_LOGS === "1"
  const options = buildLoggerOptions({
    env,
    logLevel,
    serviceName: input.serviceName,
    prettyLogs,
  })

  if (options.transport) {
    return pino(options)
  }

  return pino(options, pino.destination(LOG_DESTINATION_FD))
}

export const logger = createLogger()

/**
 * Uses child loggers so every record names the command that produced it, which keeps
 * journal output of the scheduled jobs readable.
 *
 * @param component Logical component name attached to each record.
 * @param parent Parent logger used to inherit base runtime fields.
 * @returns Component-scoped logger.
 */
export const createComponentLogger = (component: string, parent: Logger = logger): Logger => {
  return parent.child({ component })
}
