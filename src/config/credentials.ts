import { readFile } from "node:fs/promises"

import { parse as parseDotenv } from "dotenv"

import { configurationError } from "../errors.js"
import type { StewardConfig, StorageProvider } from "./steward-config.js"

export type StorageCredentials = {
  bucket: string
  accessKeyId: string
  secretAccessKey: string
  endpoint: string
  provider: StorageProvider
}

export const STORAGE_ENVIRONMENT_VARIABLES = {
  bucket: "OPENCLAW_S3_BUCKET",
  accessKeyId: "OPENCLAW_S3_ACCESS_KEY_ID",
  secretAccessKey: "OPENCLAW_S3_SECRET_ACCESS_KEY",
  endpoint: "OPENCLAW_S3_ENDPOINT",
} as const

type CredentialsConfig = Pick<StewardConfig, "environmentFiles"> & {
  backup: Pick<StewardConfig["backup"], "storageProvider">
}

/**
 * Reads the `KEY=VALUE` environment files the gateway service also receives, in order, so a
 * later file overrides an earlier one.
 *
 * @param files Environment file paths from config.
 * @returns Merged variables from all files.
 */
export const readEnvironmentFiles = async (files: string[]): Promise<Record<string, string>> => {
  const merged: Record<string, string> = {}

  for (const [index, filePath] of files.entries()) {
    let source: string

    try {
      source = await readFile(filePath, "utf8")
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw configurationError(`environmentFiles.${index}`, `cannot read ${filePath} (${reason})`)
    }

    Object.assign(merged, parseDotenv(source))
  }

  return merged
}

const requireVariable = (values: Record<string, string | undefined>, name: string): string => {
  const value = values[name]?.trim()
  if (!value) {
    throw configurationError(name, "must be set in the environment or an environment file")
  }

  return value
}

const hasAllVariables = (environment: NodeJS.ProcessEnv): boolean => {
  return Object.values(STORAGE_ENVIRONMENT_VARIABLES).every(
    (name) => (environment[name]?.trim().length ?? 0) > 0
  )
}

/**
 * Resolves remote-store credentials for backup and restore. The process environment wins
 * over environment files, matching how the supervisor layers them; the files are only read
 * when the environment is incomplete, since sandboxed jobs may not be able to see them.
 *
 * @param config Config sections naming the environment files and provider.
 * @param environment Process environment or test override.
 * @returns Complete credentials; a missing variable is a configuration error naming it.
 */
export const resolveStorageCredentials = async (
  config: CredentialsConfig,
  environment: NodeJS.ProcessEnv = process.env
): Promise<StorageCredentials> => {
  const fromFiles = hasAllVariables(environment)
    ? {}
    : await readEnvironmentFiles(config.environmentFiles)
  const values: Record<string, string | undefined> = { ...fromFiles, ...environment }

  return {
    bucket: requireVariable(values, STORAGE_ENVIRONMENT_VARIABLES.bucket),
    accessKeyId: requireVariable(values, STORAGE_ENVIRONMENT_VARIABLES.accessKeyId),
    secretAccessKey: requireVariable(values, STORAGE_ENVIRONMENT_VARIABLES.secretAccessKey),
    endpoint: requireVariable(values, STORAGE_ENVIRONMENT_VARIABLES.endpoint),
    provider: config.backup.storageProvider,
  }
}
