import { parseArgs } from 'node:util'
import { SshChannel, clearDeviceLock, getLockDir, loadConfig } from 'devpatch'
import { formatError } from '../output.js'

const USAGE = 'Usage: devpatch unlock [--target <host>] [--user <name>]'

export async function unlockCommand(args: string[]): Promise<number> {
  let values: { target?: string | undefined; user?: string | undefined }
  try {
    values = parseArgs({
      args,
      options: {
        target: { type: 'string' },
        user: { type: 'string' },
      },
      strict: true,
    }).values
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    process.stderr.write(`${USAGE}\n`)
    return 1
  }

  try {
    const config = await loadConfig()
    // Same key as the patch and undo runs take.
    const device = new SshChannel({
      ...config.target,
      host: values.target ?? config.target.host,
      user: values.user ?? config.target.user,
    }).describe()
    const removed = await clearDeviceLock(getLockDir(), device)
    process.stdout.write(removed ? `Removed the lock for ${device}.\n` : `No lock is held for ${device}.\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
