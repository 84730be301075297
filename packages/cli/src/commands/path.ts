import { REGISTRY_FILE_ENV, resolveRegistryLocation } from 'binpin'
import { dim, formatError } from '../output.js'

export function pathCommand(_args: string[]): number {
  try {
    const location = resolveRegistryLocation()
    const note = location.source === 'override' ? `(from ${REGISTRY_FILE_ENV})` : '(default)'
    process.stdout.write(`${location.path} ${dim(note)}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
