/**
 * Shared driver for `devpatch patch` and `devpatch undo`.
 */

import { parseArgs } from 'node:util'
import {
  PatchOrchestrator,
  ProfileRegistry,
  SshChannel,
  acquireDeviceLock,
  exitCodeFor,
  getLockDir,
  loadConfig,
} from 'devpatch'
import type { DeviceTarget, OrchestratorEvent, SessionMode } from 'devpatch'
import { promptConfirmation } from '../confirm.js'
import { bold, formatError, formatEvent, formatFailure } from '../output.js'
import type { SessionCommandOptions } from '../types.js'

const USAGE: Record<SessionMode, string> = {
  patch: 'Usage: devpatch patch [--target <host>] [--user <name>] [--backup <path>] [--profile <id>] [--yes]',
  undo: 'Usage: devpatch undo --backup <path> [--target <host>] [--user <name>] [--profile <id>] [--yes]',
}

function parseSessionArgs(args: string[]): SessionCommandOptions {
  const { values } = parseArgs({
    args,
    options: {
      target: { type: 'string' },
      user: { type: 'string' },
      backup: { type: 'string' },
      profile: { type: 'string' },
      yes: { type: 'boolean', short: 'y' },
    },
    strict: true,
  })
  return values
}

function reportEvent(event: OrchestratorEvent): void {
  const line = formatEvent(event)
  if (line === undefined) return
  if (line.stream === 'stdout') {
    process.stdout.write(`${line.text}\n`)
  } else {
    process.stderr.write(`${line.text}\n`)
  }
}

/**
 * Run a patch or undo session against the configured device.
 * Resolves with the process exit code.
 */
export async function sessionCommand(mode: SessionMode, args: string[]): Promise<number> {
  let options: SessionCommandOptions
  try {
    options = parseSessionArgs(args)
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    process.stderr.write(`${USAGE[mode]}\n`)
    return 1
  }

  if (mode === 'undo' && options.backup === undefined) {
    process.stderr.write('Error: --backup is required\n')
    process.stderr.write(`${USAGE.undo}\n`)
    return 1
  }

  try {
    const config = await loadConfig()
    const registry = await ProfileRegistry.load(config.profileDirs)
    const profile = registry.get(options.profile ?? config.profile)
    const target: DeviceTarget = {
      ...config.target,
      host: options.target ?? config.target.host,
      user: options.user ?? config.target.user,
    }
    const backupPath = options.backup ?? config.backupPath
    const channel = new SshChannel(target)

    if (options.yes !== true) {
      const confirmed = await promptConfirmation({
        mode,
        device: channel.describe(),
        profile: profile.description,
        backupPath,
        warnings: profile.warnings,
      })
      if (!confirmed) {
        process.stderr.write('Aborted. No changes have been made to the device.\n')
        return 1
      }
    }

    const lock = await acquireDeviceLock(getLockDir(), channel.describe())
    try {
      const orchestrator = new PatchOrchestrator({ channel, profile, onEvent: reportEvent })
      const report = await orchestrator.run({ mode, target, backupPath })

      if (!report.outcome.ok) {
        process.stderr.write(`${formatFailure(report.outcome.error)}\n`)
        return exitCodeFor(report.outcome.error.kind)
      }

      if (mode === 'patch') {
        process.stdout.write(`\n${bold('Patch installed.')} ${profile.service} is running the patched binary.\n`)
        process.stdout.write(`Keep ${backupPath}: "devpatch undo --backup ${backupPath}" needs it.\n`)
      } else {
        process.stdout.write(`\n${bold('Original binary restored.')} ${profile.service} has been restarted.\n`)
      }
      return 0
    } finally {
      await lock.release()
    }
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
