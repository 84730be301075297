/**
 * @binpin/test-helpers — Test utilities for binpin consumers.
 *
 * @packageDocumentation
 */

export { TestRegistryDir } from './test-registry-dir.js'
export type { TestRegistryDirOptions } from './test-registry-dir.js'
export { fakeDigest, registryYaml } from './fixtures.js'
export type { RegistryYamlOptions } from './fixtures.js'
