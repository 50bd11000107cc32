/**
 * Failure taxonomy of a run and its exit codes.
 */

import type { OrchestratorState } from './states.js'

/**
 * Why a run stopped.
 *
 * - `connection`: the device could not be reached.
 * - `fetch`: the binary could not be copied from the device.
 * - `version-mismatch`: the device runs a binary the profile does not apply to
 *   (another version, or already patched).
 * - `backup-invalid`: the backup given to undo is missing, unreadable or not
 *   the original binary.
 * - `backup-write`: the original could not be saved, or a different file is
 *   already at the backup path.
 * - `patch-apply`: the payload is malformed or produced the wrong length.
 * - `patch-integrity`: the patched binary is not the expected one.
 * - `service-control`: stopping or restarting the service failed.
 * - `transfer`: copying the new binary into place failed.
 * - `corrupted-transfer`: the installed binary does not have the expected
 *   digest.
 */
export type FailureKind =
  | 'connection'
  | 'fetch'
  | 'version-mismatch'
  | 'backup-invalid'
  | 'backup-write'
  | 'patch-apply'
  | 'patch-integrity'
  | 'service-control'
  | 'transfer'
  | 'corrupted-transfer'

/**
 * A run that stopped before `done`.
 * @public
 */
export interface Failure {
  kind: FailureKind
  /** State the run was in when it failed. */
  stage: OrchestratorState
  message: string
  /** Whether the run had already written to the device. */
  deviceModified: boolean
  /** What the operator should do next, one instruction per entry. */
  guidance: string[]
}

const EXIT_CODES: Readonly<Record<FailureKind, number>> = {
  connection: 1,
  fetch: 2,
  'version-mismatch': 3,
  'backup-invalid': 3,
  'backup-write': 3,
  'patch-apply': 4,
  'patch-integrity': 4,
  transfer: 5,
  'corrupted-transfer': 6,
  'service-control': 7,
}

/** Process exit code for a failure of `kind`. */
export function exitCodeFor(kind: FailureKind): number {
  return EXIT_CODES[kind]
}
