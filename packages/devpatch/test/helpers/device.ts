/**
 * Shared test helpers for a device reached through a RemoteChannel.
 */

import { computeDigest } from '../../src/checksum/digest.js'
import { ok, err } from '../../src/types.js'
import type { ChannelFailure, ChannelOperation, RemoteChannel, RemoteExecResult } from '../../src/channel/types.js'

export interface FakeDeviceOptions {
  files?: Record<string, Uint8Array>
  services?: string[]
  /** Operations that fail at the transport level, with their message. */
  fail?: Partial<Record<ChannelOperation, string>>
  /** Operation whose call rejects instead of resolving. */
  throwOn?: ChannelOperation
  /** Exit status for commands starting with the key. */
  exitCodes?: Record<string, number>
  /** Transform applied to every pushed file. */
  onPush?: (bytes: Uint8Array) => Uint8Array
}

export interface FakeDevice {
  channel: RemoteChannel
  /** Every call the channel received, e.g. `pull /usr/bin/testd`. */
  calls: string[]
  files: Map<string, Uint8Array>
  running: Set<string>
}

const done = (stdout = ''): RemoteExecResult => ({ stdout, stderr: '', exitCode: 0 })

/**
 * Create an in-memory device whose `exec` understands the commands the
 * orchestrator sends. Unknown commands exit 127.
 */
export function createFakeDevice(options: FakeDeviceOptions = {}): FakeDevice {
  const calls: string[] = []
  const files = new Map(Object.entries(options.files ?? {}))
  const running = new Set(options.services ?? [])

  function failure(operation: ChannelOperation): ChannelFailure | undefined {
    if (options.throwOn === operation) {
      throw new Error(`${operation} exploded`)
    }
    const message = options.fail?.[operation]
    return message === undefined ? undefined : { operation, message }
  }

  function run(command: string): RemoteExecResult {
    for (const [prefix, exitCode] of Object.entries(options.exitCodes ?? {})) {
      if (command.startsWith(prefix)) {
        return { stdout: '', stderr: `${prefix} failed`, exitCode }
      }
    }
    const [name, ...args] = command.split(' ')
    switch (name) {
      case 'exit':
        return done()
      case 'systemctl': {
        const [action, service = ''] = args
        if (action === 'stop') running.delete(service)
        else running.add(service)
        return done()
      }
      case 'mv': {
        const [, from = '', to = ''] = args
        const bytes = files.get(from)
        if (bytes === undefined) return { stdout: '', stderr: `mv: can't rename '${from}'`, exitCode: 1 }
        files.delete(from)
        files.set(to, bytes)
        return done()
      }
      case 'rm':
        files.delete(args[1] ?? '')
        return done()
      case 'md5sum': {
        const target = args[0] ?? ''
        const bytes = files.get(target)
        if (bytes === undefined) return { stdout: '', stderr: `md5sum: ${target}: No such file`, exitCode: 1 }
        return done(`${computeDigest(bytes)}  ${target}\n`)
      }
      default:
        return { stdout: '', stderr: `sh: ${name ?? ''}: not found`, exitCode: 127 }
    }
  }

  const channel: RemoteChannel = {
    describe: () => 'root@device.test',
    probe: () => {
      calls.push('probe')
      const failed = failure('probe')
      return Promise.resolve(failed === undefined ? ok(undefined) : err(failed))
    },
    pull: (remotePath) => {
      calls.push(`pull ${remotePath}`)
      const failed = failure('pull')
      if (failed !== undefined) return Promise.resolve(err(failed))
      const bytes = files.get(remotePath)
      if (bytes === undefined) {
        const missing: ChannelFailure = { operation: 'pull', message: `${remotePath}: No such file` }
        return Promise.resolve(err(missing))
      }
      return Promise.resolve(ok(Uint8Array.from(bytes)))
    },
    push: (bytes, remotePath) => {
      calls.push(`push ${remotePath}`)
      const failed = failure('push')
      if (failed !== undefined) return Promise.resolve(err(failed))
      const stored = Uint8Array.from(bytes)
      files.set(remotePath, options.onPush !== undefined ? options.onPush(stored) : stored)
      return Promise.resolve(ok(undefined))
    },
    exec: (command) => {
      calls.push(`exec ${command}`)
      const failed = failure('exec')
      if (failed !== undefined) return Promise.resolve(err(failed))
      return Promise.resolve(ok(run(command)))
    },
  }

  return { channel, calls, files, running }
}
