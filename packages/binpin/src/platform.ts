/**
 * Platform key derivation.
 *
 * The registry stores one digest per supported OS/architecture pair. The
 * matrix is closed: linux and darwin on amd64 and arm64, windows on amd64.
 */

import { UnsupportedPlatformError } from './errors.js'

/** Canonical order of the supported platform keys. */
export const PLATFORM_KEYS = [
  'linux_amd64',
  'linux_arm64',
  'darwin_amd64',
  'darwin_arm64',
  'windows_amd64',
] as const

/**
 * One of the supported `<os>_<arch>` identifiers.
 * @public
 */
export type PlatformKey = (typeof PLATFORM_KEYS)[number]

/**
 * Raw OS/architecture identifiers in the registry's vocabulary
 * (`linux`, `darwin`, `windows` / `amd64`, `arm64`).
 * @public
 */
export interface HostPlatform {
  os: string
  arch: string
}

const SUPPORTED: Readonly<Record<string, Readonly<Record<string, PlatformKey>>>> = {
  linux: { amd64: 'linux_amd64', arm64: 'linux_arm64' },
  darwin: { amd64: 'darwin_amd64', arm64: 'darwin_arm64' },
  windows: { amd64: 'windows_amd64' },
}

/** Type guard for {@link PlatformKey}. */
export function isPlatformKey(value: unknown): value is PlatformKey {
  return typeof value === 'string' && PLATFORM_KEYS.some((key) => key === value)
}

/**
 * Map an OS/architecture pair to its platform key.
 *
 * @throws {@link UnsupportedPlatformError} for any pair outside the matrix.
 */
export function resolvePlatformKey(os: string, arch: string): PlatformKey {
  const byArch = Object.hasOwn(SUPPORTED, os) ? SUPPORTED[os] : undefined
  const key = byArch !== undefined && Object.hasOwn(byArch, arch) ? byArch[arch] : undefined
  if (key === undefined) {
    throw new UnsupportedPlatformError(os, arch)
  }
  return key
}

/**
 * Describe the running host in registry vocabulary.
 *
 * Node reports `win32` and `x64`; those become `windows` and `amd64`. Every
 * other value is passed through untouched.
 */
export function hostPlatform(
  platform: string = process.platform,
  arch: string = process.arch,
): HostPlatform {
  return {
    os: platform === 'win32' ? 'windows' : platform,
    arch: arch === 'x64' ? 'amd64' : arch,
  }
}

/** Platform key of the running host (or of `host`, when given). */
export function currentPlatformKey(host: HostPlatform = hostPlatform()): PlatformKey {
  return resolvePlatformKey(host.os, host.arch)
}
