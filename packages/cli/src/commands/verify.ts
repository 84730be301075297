import { parseArgs } from 'node:util'
import { verifyBinary } from 'binpin'
import { formatError } from '../output.js'
import { registryOptions } from '../registry-options.js'

export async function verifyCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      file: { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  })

  const [binary, version] = positionals
  if (binary === undefined || version === undefined) {
    process.stderr.write('Error: a binary path and a version are required\n')
    process.stderr.write('Usage: binpin verify <binary> <version> [--file <path>]\n')
    return 1
  }

  try {
    const resolved = await verifyBinary(binary, version, registryOptions(values.file))
    process.stdout.write(
      `OK ${binary} matches ${resolved.version} (${resolved.platformKey}) sha256:${resolved.digest}\n`,
    )
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
