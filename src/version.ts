/**
 * Release identifier reported by `--version` and attached to startup logs.
 */
export const APP_VERSION = "0.1.0"

export const getAppVersion = (): string => {
  return APP_VERSION
}
