/**
 * PatchOrchestrator: fetches, verifies, patches and installs a device
 * binary, or restores it from a backup.
 *
 * Every step is awaited before the next one starts and every result is
 * checked before the state advances. Nothing is retried: a failed run stops
 * where it failed and says what was, and was not, changed on the device.
 */

import { applyPatch } from '../bsdiff/apply.js'
import { parseDigestOutput, verifyDigest } from '../checksum/digest.js'
import type { ExpectedDigest } from '../checksum/digest.js'
import { BinaryImage } from '../image.js'
import { ok, err } from '../types.js'
import type { Result, Session, SessionMode } from '../types.js'
import type { ChannelFailure, ChannelOperation, RemoteChannel, RemoteExecResult } from '../channel/types.js'
import type { PatchProfile } from '../profile/types.js'
import { readBackup, writeBackup } from './backup.js'
import type { BackupStatus } from './backup.js'
import { canTransition, initialState } from './states.js'
import type { OrchestratorState, TerminalState } from './states.js'
import type { Failure } from './failure.js'

/** Suffix of the remote file the new binary is copied to before the rename. */
export const STAGING_SUFFIX = '.devpatch-new'

const NO_CHANGES = 'No changes have been made to the device.'

/** Progress notifications emitted while a run is in flight. */
export type OrchestratorEvent =
  | { type: 'transition'; from: OrchestratorState; to: OrchestratorState }
  | { type: 'info'; message: string }
  | { type: 'warning'; message: string }

/** @public */
export interface OrchestratorOptions {
  channel: RemoteChannel
  profile: PatchProfile
  onEvent?: ((event: OrchestratorEvent) => void) | undefined
}

/** What a successful run did. */
export interface RunSummary {
  mode: SessionMode
  profileId: string
  backupPath: string
  /** Patch runs only: whether the backup was written or already present. */
  backupStatus?: BackupStatus | undefined
  /** Digest of the binary now installed on the device. */
  remoteDigest: string
}

/**
 * Result of one run.
 * @public
 */
export interface RunReport {
  mode: SessionMode
  state: TerminalState
  /** Every state the run passed through, starting with the initial one. */
  trail: OrchestratorState[]
  outcome: Result<RunSummary, Failure>
}

/** A failure before the run has attached the state it happened in. */
type StepFailure = Omit<Failure, 'stage'>

function stepFailure(
  kind: Failure['kind'],
  message: string,
  deviceModified: boolean,
  guidance: string[],
): StepFailure {
  return { kind, message, deviceModified, guidance }
}

/** Tracks the state of a single run. */
class Run {
  readonly mode: SessionMode
  readonly #trail: OrchestratorState[]
  readonly #emit: (event: OrchestratorEvent) => void
  #state: OrchestratorState

  constructor(mode: SessionMode, emit: (event: OrchestratorEvent) => void) {
    this.mode = mode
    this.#emit = emit
    this.#state = initialState(mode)
    this.#trail = [this.#state]
  }

  advance(to: OrchestratorState): void {
    const from = this.#state
    if (!canTransition(from, to)) {
      throw new Error(`Illegal state transition: ${from} -> ${to}`)
    }
    this.#state = to
    this.#trail.push(to)
    this.#emit({ type: 'transition', from, to })
  }

  fail(failure: StepFailure): RunReport {
    const stage = this.#state
    this.advance('failed')
    return { mode: this.mode, state: 'failed', trail: [...this.#trail], outcome: err({ ...failure, stage }) }
  }

  succeed(summary: RunSummary): RunReport {
    this.advance('done')
    return { mode: this.mode, state: 'done', trail: [...this.#trail], outcome: ok(summary) }
  }
}

/**
 * Runs patch and undo sessions for one profile over one channel.
 * @public
 */
export class PatchOrchestrator {
  readonly #channel: RemoteChannel
  readonly #profile: PatchProfile
  readonly #onEvent: ((event: OrchestratorEvent) => void) | undefined

  constructor(options: OrchestratorOptions) {
    this.#channel = options.channel
    this.#profile = options.profile
    this.#onEvent = options.onEvent
  }

  /** Run `session` in its mode. */
  run(session: Session): Promise<RunReport> {
    return session.mode === 'patch' ? this.patch(session.backupPath) : this.undo(session.backupPath)
  }

  /**
   * Patch the device's binary, keeping the original at `backupPath`.
   */
  async patch(backupPath: string): Promise<RunReport> {
    const run = new Run('patch', (event) => {
      this.#emit(event)
    })
    const profile = this.#profile

    const probe = await this.#probe()
    if (!probe.ok) return run.fail(probe.error)

    this.#info(`Copying ${profile.remotePath} from ${this.#channel.describe()}...`)
    const pulled = await this.#guard('pull', () => this.#channel.pull(profile.remotePath))
    if (!pulled.ok) {
      return run.fail(
        stepFailure('fetch', `Failed to copy ${profile.remotePath} from the device: ${pulled.error.message}`, false, [
          NO_CHANGES,
        ]),
      )
    }
    const source = new BinaryImage(pulled.value)
    run.advance('fetched-source')

    if (!verifyDigest(source, profile.sourceDigest)) {
      return run.fail(
        stepFailure(
          'version-mismatch',
          `The device is running an incompatible ${profile.service} version or it has already been patched ` +
            `(digest ${source.digest}, expected ${profile.sourceDigest.value})`,
          false,
          [NO_CHANGES],
        ),
      )
    }
    run.advance('verified-source')

    const backup = await writeBackup(backupPath, source)
    if (!backup.ok) {
      return run.fail(stepFailure('backup-write', backup.error, false, [NO_CHANGES]))
    }
    this.#info(
      backup.value === 'created'
        ? `Backup created at ${backupPath}. Do not lose it: undoing the patch needs it.`
        : `Backup at ${backupPath} already holds this binary; keeping it.`,
    )

    this.#info(`Patching ${profile.service}...`)
    const patched = applyPatch(source, profile.payload)
    if (!patched.ok) {
      return run.fail(
        stepFailure('patch-apply', `Failed to apply the patch: ${patched.error.message}`, false, [NO_CHANGES]),
      )
    }
    run.advance('patched')

    if (!verifyDigest(patched.value, profile.patchedDigest)) {
      return run.fail(
        stepFailure(
          'patch-integrity',
          `The patched binary has digest ${patched.value.digest}, expected ${profile.patchedDigest.value}; refusing to install it`,
          false,
          [NO_CHANGES],
        ),
      )
    }
    run.advance('verified-patched')

    this.#info(`Installing the patched ${profile.service}. Do not disconnect or lock the device.`)
    const installed = await this.#installAndRestart(run, patched.value, profile.patchedDigest, backupPath)
    if (!installed.ok) return run.fail(installed.error)

    return run.succeed({
      mode: 'patch',
      profileId: profile.id,
      backupPath,
      backupStatus: backup.value,
      remoteDigest: installed.value,
    })
  }

  /**
   * Restore the original binary from `backupPath`.
   *
   * The backup is read and checked against the profile's source digest
   * before the device is contacted at all.
   */
  async undo(backupPath: string): Promise<RunReport> {
    const run = new Run('undo', (event) => {
      this.#emit(event)
    })
    const profile = this.#profile

    const backup = await readBackup(backupPath)
    if (!backup.ok) {
      return run.fail(stepFailure('backup-invalid', backup.error, false, [NO_CHANGES]))
    }
    if (!verifyDigest(backup.value, profile.sourceDigest)) {
      return run.fail(
        stepFailure(
          'backup-invalid',
          `Backup ${backupPath} is incorrect or corrupted (digest ${backup.value.digest}, expected ${profile.sourceDigest.value})`,
          false,
          [NO_CHANGES],
        ),
      )
    }
    run.advance('validated-backup')

    const probe = await this.#probe()
    if (!probe.ok) return run.fail(probe.error)

    this.#info(`Restoring the original ${profile.service}. Do not disconnect or lock the device.`)
    const installed = await this.#installAndRestart(run, backup.value, profile.sourceDigest, backupPath)
    if (!installed.ok) return run.fail(installed.error)

    return run.succeed({ mode: 'undo', profileId: profile.id, backupPath, remoteDigest: installed.value })
  }

  /**
   * Stop the service, install `image`, check the installed digest and start
   * the service again. Resolves with the installed digest.
   */
  async #installAndRestart(
    run: Run,
    image: BinaryImage,
    expected: ExpectedDigest,
    backupPath: string,
  ): Promise<Result<string, StepFailure>> {
    const { remotePath, service } = this.#profile
    const undoGuidance = [
      `${remotePath} on the device may be inconsistent and ${service} may be stopped.`,
      `Restore the original binary with: devpatch undo --backup ${backupPath}`,
    ]

    const stop = await this.#remote(`systemctl stop ${service}`)
    if (!stop.ok) {
      return err(stepFailure('service-control', `Failed to stop ${service}: ${stop.error}`, false, [NO_CHANGES]))
    }

    const staging = `${remotePath}${STAGING_SUFFIX}`
    const intact = [`${remotePath} on the device was not replaced. Please try again.`]
    const pushed = await this.#guard('push', () => this.#channel.push(image.bytes, staging))
    if (!pushed.ok) {
      await this.#abandonStaging(staging)
      return err(
        stepFailure('transfer', `Failed to copy the new binary to the device: ${pushed.error.message}`, false, intact),
      )
    }

    // rename(2) on the same filesystem: the old binary stays whole until the
    // new one replaces it
    const moved = await this.#remote(`mv -f ${staging} ${remotePath}`)
    if (!moved.ok) {
      await this.#abandonStaging(staging)
      return err(stepFailure('transfer', `Failed to move the new binary into place: ${moved.error}`, false, intact))
    }
    run.advance('transferred')

    const sum = await this.#remote(`md5sum ${remotePath}`)
    if (!sum.ok) {
      return err(
        stepFailure('corrupted-transfer', `Could not checksum the installed binary: ${sum.error}`, true, undoGuidance),
      )
    }
    const remoteDigest = parseDigestOutput(sum.value.stdout)
    if (remoteDigest === undefined || !verifyDigest({ digest: remoteDigest }, expected)) {
      return err(
        stepFailure(
          'corrupted-transfer',
          `The transferred binary appears to be corrupted (digest ${remoteDigest ?? 'unreadable'}, expected ${expected.value})`,
          true,
          undoGuidance,
        ),
      )
    }
    run.advance('verified-remote')

    const restart = await this.#remote(`systemctl restart ${service}`)
    if (!restart.ok) {
      return err(
        stepFailure('service-control', `Failed to restart ${service}: ${restart.error}`, true, [
          `The new binary is installed and verified, but ${service} is not running.`,
          `Restart it on the device with "systemctl restart ${service}", or reboot the device.`,
          `To return to the original binary instead, run: devpatch undo --backup ${backupPath}`,
        ]),
      )
    }
    run.advance('restarted')

    return ok(remoteDigest)
  }

  /**
   * Remove a staging file left by a failed install and start the service
   * again on the binary still in place.
   */
  async #abandonStaging(staging: string): Promise<void> {
    const removed = await this.#remote(`rm -f ${staging}`)
    if (!removed.ok) {
      this.#warn(`Could not remove ${staging} from the device: ${removed.error}`)
    }

    const service = this.#profile.service
    const started = await this.#remote(`systemctl start ${service}`)
    if (started.ok) {
      this.#info(`Started ${service} again.`)
    } else {
      this.#warn(`Could not start ${service} again: ${started.error}. Reboot the device.`)
    }
  }

  async #probe(): Promise<Result<void, StepFailure>> {
    const probe = await this.#guard('probe', () => this.#channel.probe())
    if (!probe.ok) {
      return err(
        stepFailure('connection', `Failed to establish a connection: ${probe.error.message}`, false, [
          'Check that the device is connected, unlocked and reachable over SSH.',
        ]),
      )
    }
    return ok(undefined)
  }

  /** Run `command` on the device; a non-zero exit status is a failure. */
  async #remote(command: string): Promise<Result<RemoteExecResult, string>> {
    const result = await this.#guard('exec', () => this.#channel.exec(command))
    if (!result.ok) {
      return err(result.error.message)
    }
    if (result.value.exitCode !== 0) {
      const detail = result.value.stderr.trim()
      return err(
        `"${command}" exited with status ${String(result.value.exitCode)}${detail !== '' ? `: ${detail}` : ''}`,
      )
    }
    return ok(result.value)
  }

  /** Turn a channel that throws into a failed result. */
  async #guard<T>(
    operation: ChannelOperation,
    call: () => Promise<Result<T, ChannelFailure>>,
  ): Promise<Result<T, ChannelFailure>> {
    try {
      return await call()
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e)
      return err({ operation, message })
    }
  }

  #info(message: string): void {
    this.#emit({ type: 'info', message })
  }

  #warn(message: string): void {
    this.#emit({ type: 'warning', message })
  }

  #emit(event: OrchestratorEvent): void {
    this.#onEvent?.(event)
  }
}
