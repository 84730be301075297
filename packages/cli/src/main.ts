/**
 * Command dispatch for the binpin CLI.
 *
 * Each subcommand is lazy-loaded via dynamic import() so only the requested
 * command's module is evaluated.
 *
 * @internal
 */

import { formatError } from './output.js'

const HELP =
  'Usage: binpin <command> [options]\n\n' +
  'Commands:\n' +
  '  path                          Show where the checksum registry is read from\n' +
  '  init                          Install the bundled registry if none exists\n' +
  '  validate [--file <path>]      Validate the registry\n' +
  '  list [--file <path>]          List versions and their platforms\n' +
  '  platform                      Show the platform key of this host\n' +
  '  digest <version>              Print the expected SHA-256 for a version\n' +
  '  verify <binary> <version>     Check a binary against the registry\n' +
  '  add <version> --<platform> <sha256>...\n' +
  '                                Print the registry extended with a new version\n'

function printHelp(): void {
  process.stdout.write(HELP)
}

async function dispatch(subcommand: string, commandArgs: string[]): Promise<number> {
  switch (subcommand) {
    case 'path': {
      const { pathCommand } = await import('./commands/path.js')
      return pathCommand(commandArgs)
    }
    case 'init': {
      const { initCommand } = await import('./commands/init.js')
      return initCommand(commandArgs)
    }
    case 'validate': {
      const { validateCommand } = await import('./commands/validate.js')
      return validateCommand(commandArgs)
    }
    case 'list': {
      const { listCommand } = await import('./commands/list.js')
      return listCommand(commandArgs)
    }
    case 'platform': {
      const { platformCommand } = await import('./commands/platform.js')
      return platformCommand(commandArgs)
    }
    case 'digest': {
      const { digestCommand } = await import('./commands/digest.js')
      return digestCommand(commandArgs)
    }
    case 'verify': {
      const { verifyCommand } = await import('./commands/verify.js')
      return verifyCommand(commandArgs)
    }
    case 'add': {
      const { addCommand } = await import('./commands/add.js')
      return addCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}

/**
 * Run the CLI with `argv` (arguments after the script name) and return the
 * process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const [subcommand, ...commandArgs] = argv
  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  try {
    return await dispatch(subcommand, commandArgs)
  } catch (err) {
    // argument errors from parseArgs land here
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
