/**
 * In-memory device for testing.
 */

import { computeDigest, err, ok } from 'devpatch'
import type { ChannelFailure, ChannelOperation, RemoteChannel, RemoteExecResult, Result } from 'devpatch'

/**
 * Options for creating an {@link InMemoryDevice}.
 * @public
 */
export interface InMemoryDeviceOptions {
  /** Address reported by `describe()`. Defaults to `root@device.test`. */
  address?: string | undefined
  /** Files present on the device, keyed by absolute path. */
  files?: Record<string, Uint8Array> | undefined
  /** Services running when the device is created. */
  services?: string[] | undefined
}

interface CommandFault {
  exitCode: number
  stderr: string
}

const SYSTEMCTL = /^systemctl (start|stop|restart) (\S+)$/
const MOVE = /^mv -f (\S+) (\S+)$/
const REMOVE = /^rm -f (\S+)$/
const MD5SUM = /^md5sum (\S+)$/

/**
 * A {@link RemoteChannel} backed by a `Map` of files and a set of running
 * services.
 *
 * @remarks
 * `exec` understands the commands devpatch sends (`exit`, `systemctl`,
 * `mv -f`, `rm -f` and `md5sum`) and answers anything else with exit status
 * 127. Every call is appended to {@link InMemoryDevice.log}, so tests can
 * assert exactly what reached the device.
 *
 * @example
 * ```ts
 * const device = new InMemoryDevice({ files: { '/usr/bin/app': bytes }, services: ['app'] })
 * device.failCommand('systemctl restart', 1, 'unit failed')
 * ```
 *
 * @public
 */
export class InMemoryDevice implements RemoteChannel {
  readonly #address: string
  readonly #files = new Map<string, Uint8Array>()
  readonly #running = new Set<string>()
  readonly #log: string[] = []
  readonly #faults = new Map<ChannelOperation, string>()
  readonly #commandFaults = new Map<string, CommandFault>()
  #corruptPushes = false

  constructor(options: InMemoryDeviceOptions = {}) {
    this.#address = options.address ?? 'root@device.test'
    for (const [filePath, bytes] of Object.entries(options.files ?? {})) {
      this.#files.set(filePath, Uint8Array.from(bytes))
    }
    for (const service of options.services ?? []) {
      this.#running.add(service)
    }
  }

  /** Every operation received, in order, e.g. `pull /usr/bin/app` or `exec md5sum /usr/bin/app`. */
  get log(): readonly string[] {
    return [...this.#log]
  }

  /**
   * Make every later call of `operation` fail at the transport level.
   * @public
   */
  failOn(operation: ChannelOperation, message = `simulated ${operation} failure`): void {
    this.#faults.set(operation, message)
  }

  /**
   * Make commands starting with `prefix` exit with `exitCode` instead of
   * running.
   * @public
   */
  failCommand(prefix: string, exitCode = 1, stderr = `${prefix}: failed`): void {
    this.#commandFaults.set(prefix, { exitCode, stderr })
  }

  /**
   * Flip the last byte of every file pushed from now on, as a damaged
   * transfer would.
   * @public
   */
  corruptPushes(): void {
    this.#corruptPushes = true
  }

  /** A copy of the file at `filePath`, if there is one. */
  readFile(filePath: string): Uint8Array | undefined {
    const bytes = this.#files.get(filePath)
    return bytes === undefined ? undefined : Uint8Array.from(bytes)
  }

  hasFile(filePath: string): boolean {
    return this.#files.has(filePath)
  }

  isRunning(service: string): boolean {
    return this.#running.has(service)
  }

  describe(): string {
    return this.#address
  }

  probe(): Promise<Result<void, ChannelFailure>> {
    this.#log.push('probe')
    const fault = this.#fault('probe')
    return Promise.resolve(fault ?? ok(undefined))
  }

  pull(remotePath: string): Promise<Result<Uint8Array, ChannelFailure>> {
    this.#log.push(`pull ${remotePath}`)
    const fault = this.#fault('pull')
    if (fault !== undefined) return Promise.resolve(fault)

    const bytes = this.#files.get(remotePath)
    if (bytes === undefined) {
      const missing: ChannelFailure = { operation: 'pull', message: `${remotePath}: No such file or directory`, exitCode: 1 }
      return Promise.resolve(err(missing))
    }
    return Promise.resolve(ok(Uint8Array.from(bytes)))
  }

  push(bytes: Uint8Array, remotePath: string): Promise<Result<void, ChannelFailure>> {
    this.#log.push(`push ${remotePath}`)
    const fault = this.#fault('push')
    if (fault !== undefined) return Promise.resolve(fault)

    const stored = Uint8Array.from(bytes)
    const last = stored.length - 1
    if (this.#corruptPushes && last >= 0) {
      stored[last] = (stored[last] ?? 0) ^ 0xff
    }
    this.#files.set(remotePath, stored)
    return Promise.resolve(ok(undefined))
  }

  exec(command: string): Promise<Result<RemoteExecResult, ChannelFailure>> {
    this.#log.push(`exec ${command}`)
    const fault = this.#fault('exec')
    if (fault !== undefined) return Promise.resolve(fault)

    for (const [prefix, commandFault] of this.#commandFaults) {
      if (command.startsWith(prefix)) {
        return Promise.resolve(ok({ stdout: '', stderr: commandFault.stderr, exitCode: commandFault.exitCode }))
      }
    }
    return Promise.resolve(ok(this.#run(command)))
  }

  #fault(operation: ChannelOperation): Result<never, ChannelFailure> | undefined {
    const message = this.#faults.get(operation)
    return message === undefined ? undefined : err({ operation, message })
  }

  #run(command: string): RemoteExecResult {
    if (command === 'exit') {
      return { stdout: '', stderr: '', exitCode: 0 }
    }

    const systemctl = SYSTEMCTL.exec(command)
    if (systemctl?.[1] !== undefined && systemctl[2] !== undefined) {
      if (systemctl[1] === 'stop') {
        this.#running.delete(systemctl[2])
      } else {
        this.#running.add(systemctl[2])
      }
      return { stdout: '', stderr: '', exitCode: 0 }
    }

    const move = MOVE.exec(command)
    if (move?.[1] !== undefined && move[2] !== undefined) {
      const bytes = this.#files.get(move[1])
      if (bytes === undefined) {
        return { stdout: '', stderr: `mv: can't rename '${move[1]}': No such file or directory`, exitCode: 1 }
      }
      this.#files.delete(move[1])
      this.#files.set(move[2], bytes)
      return { stdout: '', stderr: '', exitCode: 0 }
    }

    const remove = REMOVE.exec(command)
    if (remove?.[1] !== undefined) {
      this.#files.delete(remove[1])
      return { stdout: '', stderr: '', exitCode: 0 }
    }

    const md5sum = MD5SUM.exec(command)
    if (md5sum?.[1] !== undefined) {
      const bytes = this.#files.get(md5sum[1])
      if (bytes === undefined) {
        return { stdout: '', stderr: `md5sum: ${md5sum[1]}: No such file or directory`, exitCode: 1 }
      }
      return { stdout: `${computeDigest(bytes)}  ${md5sum[1]}\n`, stderr: '', exitCode: 0 }
    }

    return { stdout: '', stderr: `sh: ${command.split(' ')[0] ?? command}: not found`, exitCode: 127 }
  }
}
