/**
 * Types for the checksum registry.
 */

import type { PlatformKey } from '../platform.js'

/** The only registry schema revision this build understands. */
export const SCHEMA_VERSION = 1

/**
 * Per-version SHA-256 digests, one optional field per platform key.
 * @public
 */
export type PlatformChecksums = Partial<Record<PlatformKey, string>>

/**
 * A validated checksum registry.
 *
 * @remarks
 * `versions` is keyed by normalized version (`2.31.1`, never `v2.31.1`).
 * Treat it as read-only; {@link extendRegistry} is the one sanctioned way to
 * add to it.
 *
 * @public
 */
export interface Registry {
  schemaVersion: number
  /** Informational only; never validated. */
  generatedAt?: string | undefined
  versions: Map<string, PlatformChecksums>
}

/**
 * Machine-readable classification of a {@link RegistryViolation}.
 * @public
 */
export type RegistryViolationCode =
  | 'invalid-document'
  | 'schema-version'
  | 'empty-versions'
  | 'invalid-version-key'
  | 'duplicate-version-key'
  | 'invalid-entry'
  | 'invalid-checksum'
  | 'no-checksums'

/**
 * A single rule broken by a registry document.
 * @public
 */
export interface RegistryViolation {
  code: RegistryViolationCode
  /** Human-readable description, as shown in the aggregate error message. */
  message: string
  /** The version key as written in the document, when the violation concerns one. */
  version?: string | undefined
  /** The platform field concerned, for checksum violations. */
  platform?: PlatformKey | undefined
}
