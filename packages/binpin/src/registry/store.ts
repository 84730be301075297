/**
 * Bootstrap of the bundled registry and the load-or-bootstrap sequence.
 *
 * @remarks
 * Bootstrap runs only for the default location. The directory is created
 * owner-only (0700) and the file owner read/write (0600); the write uses an
 * exclusive create so concurrent bootstraps never truncate each other. An
 * existing registry is never overwritten.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { RegistryBootstrapError, RegistryReadError } from '../errors.js'
import { resolveRegistryLocation } from '../config.js'
import { BUNDLED_REGISTRY_YAML } from './bundled.js'
import { loadRegistry, parseRegistry } from './loader.js'
import type { RegistryLocation, RegistryLocationOptions } from '../config.js'
import type { Registry } from './types.js'

/**
 * Outcome of {@link bootstrapRegistry}.
 * @public
 */
export interface BootstrapResult {
  path: string
  /**
   * `written` — the bundled registry was installed.
   * `exists` — a registry was already present; nothing was touched.
   * `override` — an explicit registry path is configured; bootstrap skipped.
   */
  status: 'written' | 'exists' | 'override'
}

/**
 * A loaded registry together with where it came from.
 * @public
 */
export interface LoadedRegistry extends RegistryLocation {
  registry: Registry
  /** Whether this call installed the bundled registry. */
  bootstrapped: boolean
}

function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath)
    return true
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return false
    throw new RegistryReadError(filePath, err)
  }
}

/**
 * Validate `text` as a registry and write it to `filePath` unless a file is
 * already there.
 *
 * @returns `true` if this call created the file, `false` if it already existed.
 * @throws {@link RegistryBootstrapError} when `text` is not a valid registry
 * (nothing is written) or the directory or file cannot be created.
 * @internal
 */
export async function installRegistry(filePath: string, text: string): Promise<boolean> {
  try {
    parseRegistry(text, 'bundled registry')
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err)
    throw new RegistryBootstrapError(
      `bundled checksum registry failed validation: ${detail}`,
      filePath,
      err,
    )
  }

  const dir = path.dirname(filePath)
  try {
    await fs.mkdir(dir, { recursive: true, mode: 0o700 })
  } catch (err) {
    throw new RegistryBootstrapError(`failed to create config directory ${dir}`, filePath, err)
  }

  try {
    await fs.writeFile(filePath, text, { encoding: 'utf8', mode: 0o600, flag: 'wx' })
  } catch (err) {
    if (hasErrorCode(err, 'EEXIST')) return false
    throw new RegistryBootstrapError(`failed to write checksum registry to ${filePath}`, filePath, err)
  }
  return true
}

/**
 * Install the bundled registry at the default location if nothing is there.
 * Idempotent: a second call finds the file and writes nothing.
 */
export async function bootstrapRegistry(options?: RegistryLocationOptions): Promise<BootstrapResult> {
  const location = resolveRegistryLocation(options)
  if (location.source === 'override') {
    return { path: location.path, status: 'override' }
  }
  if (await exists(location.path)) {
    return { path: location.path, status: 'exists' }
  }
  const written = await installRegistry(location.path, BUNDLED_REGISTRY_YAML)
  return { path: location.path, status: written ? 'written' : 'exists' }
}

/**
 * Resolve the registry location, bootstrap it when it is the default and
 * absent, then load and validate it.
 */
export async function loadOrBootstrapRegistry(
  options?: RegistryLocationOptions,
): Promise<LoadedRegistry> {
  const { path: registryPath, status } = await bootstrapRegistry(options)
  const registry = await loadRegistry(registryPath)
  return {
    registry,
    path: registryPath,
    source: status === 'override' ? 'override' : 'default',
    bootstrapped: status === 'written',
  }
}
