import { currentPlatformKey } from 'binpin'
import { formatError } from '../output.js'

export function platformCommand(_args: string[]): number {
  try {
    process.stdout.write(`${currentPlatformKey()}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
