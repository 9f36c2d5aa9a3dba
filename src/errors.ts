export type StewardErrorCode =
  | "configuration"
  | "process_failed"
  | "archive_not_found"
  | "archive_failed"

/**
 * Single error type for every failure that reaches a job boundary. The code decides the
 * process exit status; the message is what the operator reads.
 */
export class StewardError extends Error {
  readonly code: StewardErrorCode

  constructor(code: StewardErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "StewardError"
    this.code = code
  }
}

/**
 * Builds a configuration error whose message always leads with the offending field, so the
 * operator can jump straight to the line that needs fixing.
 *
 * @param field Dotted config path or environment variable name.
 * @param detail What is wrong with it.
 */
export const configurationError = (field: string, detail: string): StewardError => {
  return new StewardError("configuration", `${field}: ${detail}`)
}

export const isStewardError = (error: unknown): error is StewardError => {
  return error instanceof StewardError
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }

  return String(error)
}

/**
 * Maps a failure to the exit status used by the CLI: configuration problems are never worth
 * retrying, so supervisors can tell them apart from transient failures.
 */
export const resolveExitCode = (error: unknown): number => {
  if (isStewardError(error) && error.code === "configuration") {
    return 2
  }

  return 1
}
