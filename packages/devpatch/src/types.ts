/**
 * Shared types and interfaces for devpatch.
 */

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

/** Outcome of an operation that fails in an expected way. */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

/** What a run does to the device. */
export type SessionMode = 'patch' | 'undo'

/** SSH address of the device. */
export interface DeviceTarget {
  /** Host name or IP address. */
  host: string
  /** Login user on the device. */
  user: string
  /** SSH port, when not 22. */
  port?: number | undefined
  /** Private key passed to ssh/scp with `-i`. */
  identityFile?: string | undefined
  /** Value for ssh's `ConnectTimeout` option, in seconds. */
  connectTimeoutSeconds?: number | undefined
}

/** One orchestration run, created from CLI input and discarded at exit. */
export interface Session {
  mode: SessionMode
  target: DeviceTarget
  /**
   * Local path of the original binary. A patch run writes it once; an undo
   * run reads it.
   */
  backupPath: string
}

// ---------------------------------------------------------------------------
// Preflight
// ---------------------------------------------------------------------------

/** Status of a preflight check. */
export type PreflightCheckStatus = 'ok' | 'missing'

/** Result of a preflight check for a single local tool. */
export interface PreflightCheck {
  /** Name of the tool being checked. */
  name: string
  status: PreflightCheckStatus
  /** First line of the tool's version output, when it reported one. */
  version?: string | undefined
  /** Why the status is not `'ok'`. */
  reason?: string | undefined
}

/** Aggregated result from all preflight checks. */
export interface PreflightResult {
  checks: PreflightCheck[]
  /** `true` if every required check passed. */
  ready: boolean
  /** What the operator has to do before devpatch can run. */
  nextSteps: string[]
}
