import type { StorageCredentials } from "../config/credentials.js"
import type { StorageProvider } from "../config/steward-config.js"
import type { ProcessRunner } from "../process/runner.js"
import type { ObjectStore } from "./object-store.js"

/**
 * The only variation between storage back ends: which `--s3-provider` rclone is told to use.
 * `other` leaves rclone's generic behaviour in place.
 */
export const RCLONE_S3_PROVIDERS: Record<StorageProvider, string | null> = {
  r2: "Cloudflare",
  s3: "AWS",
  minio: "Minio",
  other: null,
}

/** rclone exits with 3 when the listed directory does not exist yet. */
const RCLONE_DIRECTORY_NOT_FOUND = 3

/**
 * Credentials travel in the child environment rather than argv, so they never show up in
 * process listings or in the command line echoed by a failure.
 */
export const buildRcloneEnvironment = (
  credentials: StorageCredentials,
  baseEnvironment: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv => {
  const provider = RCLONE_S3_PROVIDERS[credentials.provider]

  return {
    ...baseEnvironment,
    RCLONE_S3_ACCESS_KEY_ID: credentials.accessKeyId,
    RCLONE_S3_SECRET_ACCESS_KEY: credentials.secretAccessKey,
    RCLONE_S3_ENDPOINT: credentials.endpoint,
    RCLONE_S3_NO_CHECK_BUCKET: "true",
    ...(provider ? { RCLONE_S3_PROVIDER: provider } : {}),
  }
}

/**
 * Addresses objects through rclone's on-the-fly S3 backend (`:s3:bucket/key`), so no rclone
 * config file has to exist on the host.
 */
export const toRcloneRemote = (bucket: string, remoteKey: string): string => {
  return `:s3:${bucket}/${remoteKey}`
}

export const parseRcloneListing = (source: string): string[] => {
  return source
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.endsWith("/"))
}

type RcloneObjectStoreOptions = {
  runner: ProcessRunner
  credentials: StorageCredentials
  rcloneCommand?: string
  baseEnvironment?: NodeJS.ProcessEnv
}

export const createRcloneObjectStore = (options: RcloneObjectStoreOptions): ObjectStore => {
  const command = options.rcloneCommand ?? "rclone"
  const env = buildRcloneEnvironment(options.credentials, options.baseEnvironment)
  const remote = (remoteKey: string) => toRcloneRemote(options.credentials.bucket, remoteKey)

  return {
    upload: async (localPath, remoteKey) => {
      await options.runner.run({ command, args: ["copyto", localPath, remote(remoteKey)], env })
    },
    download: async (remoteKey, localPath) => {
      await options.runner.run({ command, args: ["copyto", remote(remoteKey), localPath], env })
    },
    list: async (prefix) => {
      const directory = prefix.endsWith("/") ? prefix : `${prefix}/`
      const result = await options.runner.run({
        command,
        args: ["lsf", "--files-only", remote(directory)],
        env,
        acceptExitCodes: [RCLONE_DIRECTORY_NOT_FOUND],
      })

      if (result.exitCode === RCLONE_DIRECTORY_NOT_FOUND) {
        return []
      }

      return parseRcloneListing(result.stdout)
    },
    delete: async (remoteKey) => {
      await options.runner.run({ command, args: ["deletefile", remote(remoteKey)], env })
    },
  }
}
