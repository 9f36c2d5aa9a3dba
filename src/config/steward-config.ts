import { homedir } from "node:os"
import path from "node:path"
import { readFile } from "node:fs/promises"

import { parse as parseJsonc, type ParseError } from "jsonc-parser"
import { z } from "zod"

import { configurationError, StewardError } from "../errors.js"
import {
  createJobScheduleSchema,
  DEFAULT_BACKUP_SCHEDULE,
  DEFAULT_HISTORY_SCHEDULE,
} from "../scheduler/job-policy.js"

export const MODEL_BACKEND_TYPES = [
  "anthropic",
  "openai-compatible",
  "ollama",
  "rocm",
  "remote",
] as const

export const STORAGE_PROVIDERS = ["r2", "s3", "minio", "other"] as const

export type ModelBackendType = (typeof MODEL_BACKEND_TYPES)[number]
export type StorageProvider = (typeof STORAGE_PROVIDERS)[number]

const modelDefinitionSchema = z
  .object({
    backendType: z.enum(MODEL_BACKEND_TYPES),
    modelName: z.string().trim().min(1, "modelName must be a non-empty string"),
    endpoint: z.string().trim().nullish(),
    maxTokens: z
      .number()
      .int("maxTokens must be an integer")
      .positive("maxTokens must be > 0")
      .nullish(),
    temperature: z.number().nullish(),
    isDefault: z.boolean().default(false),
    extraConfig: z.record(z.string(), z.string()).nullish(),
  })
  .strict()

const stewardConfigSchema = z
  .object({
    version: z.literal(1),
    dataDir: z.string().min(1, "dataDir must be a non-empty string").default("/var/lib/openclaw"),
    user: z.string().min(1).default("openclaw"),
    group: z.string().min(1).default("openclaw"),
    network: z
      .object({
        host: z.string().min(1, "network.host must be a non-empty string").default("127.0.0.1"),
        port: z
          .number()
          .int("network.port must be an integer")
          .min(1, "network.port must be >= 1")
          .max(65535, "network.port must be <= 65535")
          .default(3000),
      })
      .strict()
      .default({}),
    gateway: z
      .object({
        executable: z.string().min(1).default("openclaw-gateway"),
      })
      .strict()
      .default({}),
    environmentFiles: z.array(z.string().min(1)).default([]),
    extraEnvironment: z.record(z.string(), z.string()).default({}),
    models: z.record(z.string().trim().min(1), modelDefinitionSchema).default({}),
    defaultModel: z.string().trim().min(1).nullable().default(null),
    rocm: z
      .object({
        enable: z.boolean().default(false),
        gfxVersion: z.string().min(1).default("11.0.0"),
        deviceIds: z.array(z.string().min(1)).default(["0"]),
      })
      .strict()
      .default({}),
    sandbox: z
      .object({
        enable: z.boolean().default(true),
        extraReadPaths: z.array(z.string().min(1)).default([]),
        extraWritePaths: z.array(z.string().min(1)).default([]),
      })
      .strict()
      .default({}),
    hostConfigDir: z.string().min(1).nullable().default(null),
    skills: z
      .object({
        enable: z.boolean().default(false),
      })
      .strict()
      .default({}),
    history: z
      .object({
        enable: z.boolean().default(true),
        schedule: createJobScheduleSchema(DEFAULT_HISTORY_SCHEDULE),
      })
      .strict()
      .default({}),
    backup: z
      .object({
        enable: z.boolean().default(false),
        schedule: createJobScheduleSchema(DEFAULT_BACKUP_SCHEDULE),
        retentionCount: z
          .number()
          .int("backup.retentionCount must be an integer")
          .min(0, "backup.retentionCount must be >= 0")
          .nullable()
          .default(168),
        storageProvider: z.enum(STORAGE_PROVIDERS).default("r2"),
      })
      .strict()
      .default({}),
    tuning: z
      .object({
        restart: z
          .object({
            limitBurst: z.number().int().min(1).default(5),
            limitIntervalSec: z.number().int().min(1).default(300),
            restartSec: z.number().int().min(0).default(5),
          })
          .strict()
          .default({}),
        resources: z
          .object({
            maxMemory: z
              .string()
              .regex(/^\d+[KMGT]?$/, "tuning.resources.maxMemory must look like 8G")
              .default("8G"),
            maxFiles: z.number().int().min(1).default(65536),
            cpuQuota: z
              .string()
              .regex(/^\d+%$/, "tuning.resources.cpuQuota must look like 400%")
              .default("400%"),
          })
          .strict()
          .default({}),
        status: z
          .object({
            logLines: z.number().int().min(1).default(25),
            historyLines: z.number().int().min(1).default(10),
          })
          .strict()
          .default({}),
      })
      .strict()
      .default({}),
    supervisor: z
      .object({
        scope: z.enum(["system", "user"]).default("system"),
        unitDirectory: z.string().min(1).nullable().default(null),
        stewardExecutable: z.string().min(1).default("openclaw-steward"),
      })
      .strict()
      .default({}),
  })
  .strict()
  .superRefine((config, context) => {
    if (config.defaultModel !== null && !Object.hasOwn(config.models, config.defaultModel)) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["defaultModel"],
        message: `references unknown model '${config.defaultModel}'`,
      })
    }

    if (!path.isAbsolute(config.dataDir)) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["dataDir"],
        message: "must be an absolute path",
      })
    }
  })

export type StewardConfig = z.infer<typeof stewardConfigSchema>
export type StewardConfigInput = z.input<typeof stewardConfigSchema>
export type ModelDefinition = z.infer<typeof modelDefinitionSchema>

export type ModelRegistry = {
  models: Readonly<Record<string, ModelDefinition>>
  defaultModelKey: string | null
}

export type StewardPaths = {
  dataDir: string
  configDir: string
  secretsDir: string
  modelsConfigPath: string
  /** Copy of the config that system-scope jobs load; they cannot read the operator's home. */
  jobConfigPath: string
  unitDirectory: string
  proposalsDir: string
}

export type ResolvedStewardConfig = {
  config: StewardConfig
  configPath: string
}

const CONFIG_RELATIVE_PATH = path.join(".config", "openclaw-steward", "config.jsonc")

/**
 * Resolves which config file to load: an explicit flag wins, then the environment, then the
 * per-user default location.
 *
 * @param input Explicit path, environment and home overrides.
 * @returns Absolute config file path.
 */
export const resolveStewardConfigPath = ({
  explicitPath,
  environment = process.env,
  homeDirectory = homedir(),
}: {
  explicitPath?: string
  environment?: NodeJS.ProcessEnv
  homeDirectory?: string
} = {}): string => {
  if (explicitPath && explicitPath.trim().length > 0) {
    return path.resolve(explicitPath)
  }

  const fromEnvironment = environment.OPENCLAW_STEWARD_CONFIG?.trim()
  if (fromEnvironment) {
    return path.resolve(fromEnvironment)
  }

  return path.join(homeDirectory, CONFIG_RELATIVE_PATH)
}

/**
 * Validates a config value with the single schema, so the TypeScript types and the runtime
 * checks cannot drift apart. Every issue is reported with its field path.
 *
 * @param value Parsed JSON value.
 * @param source Where the value came from, used in the error message.
 * @returns Validated, defaulted, read-only config.
 */
export const parseStewardConfig = (value: unknown, source: string): StewardConfig => {
  const validated = stewardConfigSchema.safeParse(value)

  if (!validated.success) {
    const detail = validated.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ")

    throw new StewardError("configuration", `Invalid config in ${source}: ${detail}`)
  }

  return Object.freeze(validated.data)
}

/**
 * Loads and validates the config file once at startup. The returned value is passed to every
 * component explicitly; nothing reads configuration ambiently.
 *
 * @param configPath Absolute path to the JSONC config file.
 * @returns Validated config together with the path it was read from.
 */
export const loadStewardConfig = async (configPath: string): Promise<ResolvedStewardConfig> => {
  let source: string

  try {
    source = await readFile(configPath, "utf8")
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw configurationError("config", `file not found at ${configPath}`)
    }

    throw error
  }

  const parseErrors: ParseError[] = []
  const parsed: unknown = parseJsonc(source, parseErrors, {
    allowTrailingComma: true,
    disallowComments: false,
  })

  if (parseErrors.length > 0) {
    throw configurationError("config", `invalid JSONC in ${configPath}`)
  }

  return {
    config: parseStewardConfig(parsed, configPath),
    configPath,
  }
}

export const toModelRegistry = (config: StewardConfig): ModelRegistry => {
  return {
    models: config.models,
    defaultModelKey: config.defaultModel,
  }
}

/**
 * Derives every filesystem location from the config in one place, so setup, the unit
 * compiler and the jobs agree on where things live.
 *
 * @param config Validated config.
 * @param homeDirectory Home override for user-scope unit placement.
 */
export const resolveStewardPaths = (
  config: StewardConfig,
  homeDirectory = homedir()
): StewardPaths => {
  const configDir = path.join(config.dataDir, "config")
  const defaultUnitDirectory =
    config.supervisor.scope === "user"
      ? path.join(homeDirectory, ".config", "systemd", "user")
      : "/etc/systemd/system"

  return {
    dataDir: config.dataDir,
    configDir,
    secretsDir: path.join(config.dataDir, "secrets"),
    modelsConfigPath: path.join(configDir, "models.json"),
    jobConfigPath: path.join(configDir, "steward.jsonc"),
    unitDirectory: config.supervisor.unitDirectory ?? defaultUnitDirectory,
    proposalsDir: path.join(config.dataDir, "host-proposals"),
  }
}
