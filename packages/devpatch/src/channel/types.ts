/**
 * Remote file channel abstraction.
 */

import type { Result } from '../types.js'

/** Which channel operation failed. */
export type ChannelOperation = 'probe' | 'pull' | 'push' | 'exec'

/**
 * A channel operation that could not be carried out.
 * @public
 */
export interface ChannelFailure {
  operation: ChannelOperation
  message: string
  /** Exit code of the transport process, when there was one. */
  exitCode?: number | undefined
}

/** Output of a command run on the device. */
export interface RemoteExecResult {
  stdout: string
  stderr: string
  exitCode: number
}

/**
 * Transport to a single device: file transfer plus remote command execution.
 *
 * @remarks
 * Every operation blocks until it completes and reports failure as a value.
 * `exec` only fails when the command could not be run at all; a command that
 * ran and exited non-zero resolves `ok` with its exit code.
 *
 * Timeouts are the implementation's concern.
 *
 * @public
 */
export interface RemoteChannel {
  /** Human-readable address of the device, e.g. `root@10.11.99.1`. */
  describe(): string

  /** Check that the device is reachable and accepts the session. */
  probe(): Promise<Result<void, ChannelFailure>>

  /** Read the whole file at `remotePath`. */
  pull(remotePath: string): Promise<Result<Uint8Array, ChannelFailure>>

  /** Write `bytes` to `remotePath`, replacing any existing file. */
  push(bytes: Uint8Array, remotePath: string): Promise<Result<void, ChannelFailure>>

  /** Run a shell command on the device. */
  exec(command: string): Promise<Result<RemoteExecResult, ChannelFailure>>
}
