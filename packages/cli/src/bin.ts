/**
 * CLI entry point for devpatch.
 *
 * Each subcommand is lazy-loaded via dynamic import(), so only the requested
 * command's module and its dependencies are loaded.
 *
 * argv layout: [node, script, subcommand, ...commandArgs]
 *
 * @internal
 */

import { parseArgs } from 'node:util'
import pkg from '../package.json' with { type: 'json' }

const { positionals } = parseArgs({
  allowPositionals: true,
  strict: false,
})

const subcommand = positionals[0] ?? process.argv[2]
// argv[0]=node, argv[1]=script, argv[2]=subcommand, argv[3..]=commandArgs
const commandArgs = process.argv.slice(3)

function printHelp(): void {
  process.stdout.write(
    'Usage: devpatch <command> [options]\n\n' +
      'Commands:\n' +
      '  patch        Verify, patch and install the device binary, keeping a backup\n' +
      '  undo         Restore the original binary from a backup\n' +
      '  doctor       Run preflight checks\n' +
      '  profiles     List the available patch profiles\n' +
      '  unlock       Remove a stale device lock\n\n' +
      'Options:\n' +
      '  --help, -h       Show this help\n' +
      '  --version, -v    Show the version\n',
  )
}

async function main(): Promise<number> {
  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  switch (subcommand) {
    case '--version':
    case '-v':
      process.stdout.write(`${pkg.version}\n`)
      return 0
    case 'patch': {
      const { patchCommand } = await import('./commands/patch.js')
      return patchCommand(commandArgs)
    }
    case 'undo': {
      const { undoCommand } = await import('./commands/undo.js')
      return undoCommand(commandArgs)
    }
    case 'doctor': {
      const { doctorCommand } = await import('./commands/doctor.js')
      return doctorCommand(commandArgs)
    }
    case 'profiles': {
      const { profilesCommand } = await import('./commands/profiles.js')
      return profilesCommand(commandArgs)
    }
    case 'unlock': {
      const { unlockCommand } = await import('./commands/unlock.js')
      return unlockCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })
