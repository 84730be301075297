/**
 * Registry location: environment override and platform default paths.
 *
 * @packageDocumentation
 */

import * as path from 'node:path'
import * as os from 'node:os'
import { ConfigDirError } from './errors.js'

/** Environment variable naming an explicit registry file. */
export const REGISTRY_FILE_ENV = 'BINPIN_REGISTRY_FILE'

/** Subdirectory of the config root holding the registry. */
export const REGISTRY_SUBDIR = 'binpin'

/** File name of the registry under {@link REGISTRY_SUBDIR}. */
export const REGISTRY_FILENAME = 'cli-versions.yaml'

/**
 * Host details consulted when locating the registry. Every field defaults to
 * the running process.
 * @public
 */
export interface RegistryLocationOptions {
  /** Environment to read overrides from. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv | undefined
  /** Node platform identifier. Defaults to `process.platform`. */
  platform?: NodeJS.Platform | undefined
  /** Home directory. Defaults to `os.homedir()`. */
  homedir?: string | undefined
}

/**
 * Where the registry lives and why.
 * @public
 */
export interface RegistryLocation {
  path: string
  /** `override` when named by {@link REGISTRY_FILE_ENV}; bootstrap never runs for it. */
  source: 'override' | 'default'
}

function nonBlank(value: string | undefined): string | undefined {
  if (value === undefined) return undefined
  const trimmed = value.trim()
  return trimmed === '' ? undefined : trimmed
}

function homeDir(options?: RegistryLocationOptions): string | undefined {
  return nonBlank(options?.homedir ?? os.homedir())
}

/**
 * Return the platform-appropriate configuration root.
 *
 * Windows: `%APPDATA%`, else `~/AppData/Roaming`.
 * Elsewhere: `$XDG_CONFIG_HOME`, else `~/.config`.
 *
 * @throws {@link ConfigDirError} when neither the variable nor a home
 * directory is available.
 */
export function getDefaultConfigDir(options?: RegistryLocationOptions): string {
  const env = options?.env ?? process.env
  const platform = options?.platform ?? process.platform

  if (platform === 'win32') {
    const appData = nonBlank(env.APPDATA)
    if (appData !== undefined) return appData
    const home = homeDir(options)
    if (home !== undefined) return path.join(home, 'AppData', 'Roaming')
    throw new ConfigDirError('unable to determine APPDATA or user home directory')
  }

  const xdg = nonBlank(env.XDG_CONFIG_HOME)
  if (xdg !== undefined) return xdg
  const home = homeDir(options)
  if (home !== undefined) return path.join(home, '.config')
  throw new ConfigDirError('unable to determine config directory (XDG_CONFIG_HOME or home)')
}

/** Default registry path: `<config root>/binpin/cli-versions.yaml`. */
export function getDefaultRegistryPath(options?: RegistryLocationOptions): string {
  return path.join(getDefaultConfigDir(options), REGISTRY_SUBDIR, REGISTRY_FILENAME)
}

/**
 * Resolve the registry path. A non-blank {@link REGISTRY_FILE_ENV} wins and
 * is used as-is, without checking that it exists.
 */
export function resolveRegistryLocation(options?: RegistryLocationOptions): RegistryLocation {
  const env = options?.env ?? process.env
  const override = nonBlank(env[REGISTRY_FILE_ENV])
  if (override !== undefined) {
    return { path: override, source: 'override' }
  }
  return { path: getDefaultRegistryPath(options), source: 'default' }
}
