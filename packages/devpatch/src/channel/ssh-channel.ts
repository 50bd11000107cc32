/**
 * Remote channel over the system `ssh` and `scp` binaries.
 *
 * @remarks
 * Both tools run in batch mode, so a device that asks for a password fails
 * fast instead of hanging on a prompt nobody sees. Key-based login, or an
 * empty root password as on stock reMarkable tablets, is expected.
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { execCommandFull } from '../util/exec.js'
import type { ExecCommandResult } from '../util/exec.js'
import { ok, err } from '../types.js'
import type { DeviceTarget, Result } from '../types.js'
import type { ChannelFailure, ChannelOperation, RemoteChannel, RemoteExecResult } from './types.js'

/** ssh reserves exit status 255 for its own errors. */
const SSH_ERROR_EXIT = 255

const DEFAULT_CONNECT_TIMEOUT_SECONDS = 10

function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

function channelFailure(operation: ChannelOperation, message: string, exitCode?: number): ChannelFailure {
  return { operation, message, exitCode }
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n')
  return lines[lines.length - 1] ?? ''
}

/**
 * Run `fn` with a private temporary directory that is removed afterwards,
 * whether `fn` resolves or rejects.
 */
async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'devpatch-'))
  try {
    return await fn(dir)
  } finally {
    await fs.rm(dir, { recursive: true, force: true })
  }
}

/**
 * {@link RemoteChannel} backed by OpenSSH.
 * @public
 */
export class SshChannel implements RemoteChannel {
  readonly #target: DeviceTarget

  constructor(target: DeviceTarget) {
    this.#target = target
  }

  describe(): string {
    const port = this.#target.port !== undefined ? `:${String(this.#target.port)}` : ''
    return `${this.#target.user}@${this.#target.host}${port}`
  }

  #commonOptions(): string[] {
    const timeout = this.#target.connectTimeoutSeconds ?? DEFAULT_CONNECT_TIMEOUT_SECONDS
    const args = ['-o', 'BatchMode=yes', '-o', `ConnectTimeout=${String(timeout)}`]
    if (this.#target.identityFile !== undefined) {
      args.push('-i', this.#target.identityFile)
    }
    return args
  }

  #sshArgs(command: string): string[] {
    const args = this.#commonOptions()
    if (this.#target.port !== undefined) {
      args.push('-p', String(this.#target.port))
    }
    args.push(`${this.#target.user}@${this.#target.host}`, command)
    return args
  }

  #scpArgs(from: string, to: string): string[] {
    const args = ['-q', ...this.#commonOptions()]
    if (this.#target.port !== undefined) {
      args.push('-P', String(this.#target.port))
    }
    args.push(from, to)
    return args
  }

  #remoteLocation(remotePath: string): string {
    // scp needs brackets around IPv6 literals
    const host = this.#target.host.includes(':') ? `[${this.#target.host}]` : this.#target.host
    return `${this.#target.user}@${host}:${remotePath}`
  }

  async exec(command: string): Promise<Result<RemoteExecResult, ChannelFailure>> {
    let result: ExecCommandResult
    try {
      result = await execCommandFull('ssh', this.#sshArgs(command))
    } catch (e) {
      return err(channelFailure('exec', `Could not run ssh: ${describeError(e)}`))
    }
    if (result.exitCode === SSH_ERROR_EXIT) {
      return err(
        channelFailure('exec', `ssh to ${this.describe()} failed: ${lastLine(result.stderr)}`, result.exitCode),
      )
    }
    return ok(result)
  }

  async probe(): Promise<Result<void, ChannelFailure>> {
    const result = await this.exec('exit')
    if (!result.ok) {
      return err(channelFailure('probe', result.error.message, result.error.exitCode))
    }
    if (result.value.exitCode !== 0) {
      return err(
        channelFailure(
          'probe',
          `Connection to ${this.describe()} was refused: ${lastLine(result.value.stderr)}`,
          result.value.exitCode,
        ),
      )
    }
    return ok(undefined)
  }

  pull(remotePath: string): Promise<Result<Uint8Array, ChannelFailure>> {
    return withTempDir<Result<Uint8Array, ChannelFailure>>(async (dir) => {
      const localPath = path.join(dir, 'pulled.bin')
      let result: ExecCommandResult
      try {
        result = await execCommandFull('scp', this.#scpArgs(this.#remoteLocation(remotePath), localPath))
      } catch (e) {
        return err(channelFailure('pull', `Could not run scp: ${describeError(e)}`))
      }
      if (result.exitCode !== 0) {
        return err(
          channelFailure('pull', `Copying ${remotePath} from ${this.describe()} failed: ${lastLine(result.stderr)}`, result.exitCode),
        )
      }
      try {
        return ok(new Uint8Array(await fs.readFile(localPath)))
      } catch (e) {
        return err(channelFailure('pull', `scp reported success but produced no file: ${describeError(e)}`))
      }
    })
  }

  push(bytes: Uint8Array, remotePath: string): Promise<Result<void, ChannelFailure>> {
    return withTempDir<Result<void, ChannelFailure>>(async (dir) => {
      const localPath = path.join(dir, path.posix.basename(remotePath))
      await fs.writeFile(localPath, bytes, { mode: 0o755 })
      let result: ExecCommandResult
      try {
        result = await execCommandFull('scp', this.#scpArgs(localPath, this.#remoteLocation(remotePath)))
      } catch (e) {
        return err(channelFailure('push', `Could not run scp: ${describeError(e)}`))
      }
      if (result.exitCode !== 0) {
        return err(
          channelFailure('push', `Copying to ${remotePath} on ${this.describe()} failed: ${lastLine(result.stderr)}`, result.exitCode),
        )
      }
      return ok(undefined)
    })
  }
}
