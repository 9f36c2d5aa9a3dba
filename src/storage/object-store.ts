/**
 * Remote content store as seen by the backup and restore engines. Keys are relative to the
 * bucket root and use `/` separators.
 */
export type ObjectStore = {
  upload: (localPath: string, remoteKey: string) => Promise<void>
  download: (remoteKey: string, localPath: string) => Promise<void>
  /** Object names directly under `prefix`, without the prefix, in no particular order. */
  list: (prefix: string) => Promise<string[]>
  delete: (remoteKey: string) => Promise<void>
}

export const joinRemoteKey = (prefix: string, name: string): string => {
  const trimmedPrefix = prefix.replace(/\/+$/, "")
  return trimmedPrefix.length > 0 ? `${trimmedPrefix}/${name}` : name
}
