export { SCHEMA_VERSION } from './types.js'
export type {
  Registry,
  PlatformChecksums,
  RegistryViolation,
  RegistryViolationCode,
} from './types.js'
export { BUNDLED_VERSION, BUNDLED_REGISTRY_YAML } from './bundled.js'
export { normalizeVersion, registryViolations, validateRegistry, decodeRegistry } from './schema.js'
export { parseRegistry, loadRegistry } from './loader.js'
export { bootstrapRegistry, loadOrBootstrapRegistry } from './store.js'
export type { BootstrapResult, LoadedRegistry } from './store.js'
export { getExpectedDigest, extendRegistry } from './lookup.js'
export { serializeRegistry } from './serialize.js'
