/**
 * Error hierarchy for binpin.
 *
 * @packageDocumentation
 */

import type { PlatformKey } from './platform.js'
import type { RegistryViolation } from './registry/types.js'

/** Base error for all binpin errors. */
export class BinpinError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'BinpinError'
  }
}

// --- Host and Lookup Failures ---

/**
 * Thrown when the host OS/architecture pair is outside the supported matrix.
 */
export class UnsupportedPlatformError extends BinpinError {
  /** The raw operating-system identifier that was rejected. */
  readonly os: string

  /** The raw CPU-architecture identifier that was rejected. */
  readonly arch: string

  constructor(os: string, arch: string) {
    super(`unsupported platform: ${os}_${arch}`)
    this.name = 'UnsupportedPlatformError'
    this.os = os
    this.arch = arch
  }
}

/**
 * Thrown when the registry loaded cleanly but holds no digest for the
 * requested version on the resolved platform.
 */
export class UnsupportedVersionError extends BinpinError {
  /** The requested version, normalized (no leading `v`). */
  readonly version: string

  /** The platform key the lookup was made for. */
  readonly platformKey: PlatformKey

  constructor(version: string, platformKey: PlatformKey) {
    super(`unsupported CLI version: ${version} (no checksum for ${platformKey})`)
    this.name = 'UnsupportedVersionError'
    this.version = version
    this.platformKey = platformKey
  }
}

// --- Registry Failures ---

/**
 * Thrown when a registry document breaks one or more schema or content rules.
 *
 * @remarks
 * Validation is exhaustive: `violations` lists every problem found, in
 * document order, never only the first.
 */
export class RegistryValidationError extends BinpinError {
  /** Every rule violation found in the document. */
  readonly violations: readonly RegistryViolation[]

  /** The file the document was read from, when it came from disk. */
  readonly path: string | undefined

  constructor(violations: readonly RegistryViolation[], path?: string) {
    const detail = violations.map((v) => v.message).join('; ')
    super(detail === '' ? 'schema validation failed' : `schema validation failed: ${detail}`)
    this.name = 'RegistryValidationError'
    this.violations = violations
    this.path = path
  }
}

/**
 * Thrown when the registry file cannot be read (missing, unreadable, or a
 * directory).
 */
export class RegistryReadError extends BinpinError {
  /** The path that was being read. */
  readonly path: string

  constructor(path: string, cause: unknown) {
    super(`failed to read checksum registry at ${path}: ${describeCause(cause)}`, { cause })
    this.name = 'RegistryReadError'
    this.path = path
  }
}

/**
 * Thrown when the registry file is not well-formed YAML.
 */
export class RegistryParseError extends BinpinError {
  /** The path whose contents failed to parse. */
  readonly path: string

  constructor(path: string, cause: unknown) {
    super(`failed to parse YAML checksum registry at ${path}: ${describeCause(cause)}`, { cause })
    this.name = 'RegistryParseError'
    this.path = path
  }
}

/**
 * Thrown when the embedded default registry could not be installed.
 */
export class RegistryBootstrapError extends BinpinError {
  /** The default registry path that bootstrap was writing to. */
  readonly path: string

  constructor(message: string, path: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'RegistryBootstrapError'
    this.path = path
  }
}

// --- Infrastructure Failures ---

/**
 * Thrown when no configuration root can be determined for the default
 * registry location.
 */
export class ConfigDirError extends BinpinError {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigDirError'
  }
}

/**
 * Thrown when a file's SHA-256 digest differs from the registry's expected
 * value.
 */
export class DigestMismatchError extends BinpinError {
  /** The file that was hashed. */
  readonly filePath: string

  /** Digest recorded in the registry. */
  readonly expected: string

  /** Digest computed from the file. */
  readonly actual: string

  constructor(filePath: string, expected: string, actual: string) {
    super(`checksum mismatch for ${filePath}: expected ${expected}, got ${actual}`)
    this.name = 'DigestMismatchError'
    this.filePath = filePath
    this.expected = expected
    this.actual = actual
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
