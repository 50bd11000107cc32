/**
 * Error hierarchy for devpatch.
 *
 * @remarks
 * These are thrown for misconfiguration and environment problems. Expected
 * failures of a patch or undo run (a digest mismatch, a failed transfer) are
 * returned as `Failure` values instead; see `orchestrator/failure.ts`.
 *
 * @packageDocumentation
 */

/** Base error for all devpatch errors. */
export class DevpatchError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'DevpatchError'
  }
}

/**
 * Thrown when the config file exists but cannot be parsed or has an invalid
 * shape.
 */
export class ConfigError extends DevpatchError {
  /** Path of the offending config file, when one was read. */
  readonly path: string | undefined

  constructor(message: string, path?: string) {
    super(message)
    this.name = 'ConfigError'
    this.path = path
  }
}

/**
 * Thrown when a patch profile is unknown, or its data file is malformed.
 */
export class ProfileError extends DevpatchError {
  /** The profile id that was requested or being loaded. */
  readonly profileId: string

  constructor(message: string, profileId: string) {
    super(message)
    this.name = 'ProfileError'
    this.profileId = profileId
  }
}

/**
 * Thrown when another run already holds the lock for a device.
 */
export class DeviceBusyError extends DevpatchError {
  /** Path of the lock file that is held. */
  readonly lockPath: string

  /** Process id recorded by the lock holder, if readable. */
  readonly holderPid: number | undefined

  constructor(message: string, lockPath: string, holderPid?: number) {
    super(message)
    this.name = 'DeviceBusyError'
    this.lockPath = lockPath
    this.holderPid = holderPid
  }
}
