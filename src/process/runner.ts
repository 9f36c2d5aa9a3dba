import { spawn, type ChildProcess } from "node:child_process"

import { StewardError } from "../errors.js"

export type ProcessRequest = {
  command: string
  args: string[]
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** Exit codes treated as success in addition to 0. */
  acceptExitCodes?: number[]
}

export type ProcessResult = {
  exitCode: number
  stdout: string
  stderr: string
}

/**
 * Capability used by every component that drives an external tool. Tests replace it with an
 * in-process fake that records argv and returns canned output.
 */
export type ProcessRunner = {
  run: (request: ProcessRequest) => Promise<ProcessResult>
  /** Runs with the caller's terminal attached and resolves with the exit code. */
  runAttached: (request: ProcessRequest) => Promise<number>
}

const formatCommandLine = (request: ProcessRequest): string => {
  return [request.command, ...request.args].join(" ")
}

const assertAccepted = (request: ProcessRequest, result: ProcessResult): ProcessResult => {
  const accepted = result.exitCode === 0 || (request.acceptExitCodes ?? []).includes(result.exitCode)
  if (accepted) {
    return result
  }

  const stderrText = result.stderr.trim()
  throw new StewardError(
    "process_failed",
    stderrText.length > 0
      ? `${formatCommandLine(request)} failed with code ${result.exitCode}: ${stderrText}`
      : `${formatCommandLine(request)} failed with code ${result.exitCode}`
  )
}

const waitForExit = async (
  request: ProcessRequest,
  child: ChildProcess
): Promise<number> => {
  return await new Promise<number>((resolve, reject) => {
    child.on("error", (error) => {
      reject(
        new StewardError("process_failed", `Cannot start ${request.command}: ${error.message}`, {
          cause: error,
        })
      )
    })

    child.on("close", (code) => {
      resolve(code ?? 1)
    })
  })
}

/**
 * Spawns tools without a shell so arguments are never re-parsed, and surfaces any exit code
 * outside the accepted set as a `process_failed` error. There is no timeout: a hung tool is
 * the supervisor's to kill.
 */
export const createProcessRunner = (): ProcessRunner => {
  return {
    run: async (request) => {
      const child = spawn(request.command, request.args, {
        cwd: request.cwd,
        env: request.env ?? process.env,
        stdio: ["ignore", "pipe", "pipe"],
      })

      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []

      child.stdout?.on("data", (chunk: Buffer) => {
        stdoutChunks.push(chunk)
      })

      child.stderr?.on("data", (chunk: Buffer) => {
        stderrChunks.push(chunk)
      })

      const exitCode = await waitForExit(request, child)

      return assertAccepted(request, {
        exitCode,
        stdout: Buffer.concat(stdoutChunks).toString("utf8"),
        stderr: Buffer.concat(stderrChunks).toString("utf8"),
      })
    },
    runAttached: async (request) => {
      const child = spawn(request.command, request.args, {
        cwd: request.cwd,
        env: request.env ?? process.env,
        stdio: "inherit",
      })

      return await waitForExit(request, child)
    },
  }
}
