import * as path from 'node:path'
import { REGISTRY_FILE_ENV } from 'binpin'
import type { RegistryLocationOptions } from 'binpin'

/**
 * Location options for a `--file` flag: the file is treated exactly like the
 * override variable, so it is loaded as-is and never bootstrapped.
 *
 * @internal
 */
export function registryOptions(file: string | undefined): RegistryLocationOptions | undefined {
  if (file === undefined) return undefined
  return { env: { ...process.env, [REGISTRY_FILE_ENV]: path.resolve(file) } }
}
