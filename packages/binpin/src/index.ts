/**
 * binpin — Trusted SHA-256 checksum registry for downloaded CLI binaries.
 *
 * @packageDocumentation
 */

export {
  BinpinError,
  UnsupportedPlatformError,
  UnsupportedVersionError,
  RegistryValidationError,
  RegistryReadError,
  RegistryParseError,
  RegistryBootstrapError,
  ConfigDirError,
  DigestMismatchError,
} from './errors.js'

export type { PlatformKey, HostPlatform } from './platform.js'
export {
  PLATFORM_KEYS,
  isPlatformKey,
  resolvePlatformKey,
  hostPlatform,
  currentPlatformKey,
} from './platform.js'

export type { RegistryLocation, RegistryLocationOptions } from './config.js'
export {
  REGISTRY_FILE_ENV,
  REGISTRY_SUBDIR,
  REGISTRY_FILENAME,
  getDefaultConfigDir,
  getDefaultRegistryPath,
  resolveRegistryLocation,
} from './config.js'

export type {
  Registry,
  PlatformChecksums,
  RegistryViolation,
  RegistryViolationCode,
  BootstrapResult,
  LoadedRegistry,
} from './registry/index.js'
export {
  SCHEMA_VERSION,
  BUNDLED_VERSION,
  BUNDLED_REGISTRY_YAML,
  normalizeVersion,
  registryViolations,
  validateRegistry,
  decodeRegistry,
  parseRegistry,
  loadRegistry,
  bootstrapRegistry,
  loadOrBootstrapRegistry,
  getExpectedDigest,
  extendRegistry,
  serializeRegistry,
} from './registry/index.js'

export type { ResolveDigestOptions, ResolvedDigest } from './resolve.js'
export { resolveExpectedDigest, expectedDigestForCurrentPlatform } from './resolve.js'

export { hashFile, verifyBinary } from './verify.js'
