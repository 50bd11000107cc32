import { ProfileRegistry, loadConfig } from 'devpatch'
import { bold, dim, formatError } from '../output.js'

export async function profilesCommand(_args: string[]): Promise<number> {
  try {
    const config = await loadConfig()
    const registry = await ProfileRegistry.load(config.profileDirs)

    for (const profile of registry.list()) {
      const marker = profile.id === config.profile ? ' (default)' : ''
      process.stdout.write(`${bold(profile.id)}${marker}\n`)
      process.stdout.write(`  ${profile.description}\n`)
      process.stdout.write(dim(`  ${profile.service} at ${profile.remotePath}, source ${profile.sourceDigest.value}`) + '\n')
    }
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
