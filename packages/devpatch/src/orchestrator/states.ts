/**
 * States and transitions of a patch or undo run.
 *
 * ```
 * patch: idle → fetched-source → verified-source → patched → verified-patched
 *          → transferred → verified-remote → restarted → done
 * undo:  undo-idle → validated-backup → transferred → verified-remote
 *          → restarted → done
 * ```
 *
 * Any state other than `done` and `failed` may move to `failed`.
 */

import type { SessionMode } from '../types.js'

export type OrchestratorState =
  | 'idle'
  | 'fetched-source'
  | 'verified-source'
  | 'patched'
  | 'verified-patched'
  | 'undo-idle'
  | 'validated-backup'
  | 'transferred'
  | 'verified-remote'
  | 'restarted'
  | 'done'
  | 'failed'

/** States a run ends in. */
export type TerminalState = Extract<OrchestratorState, 'done' | 'failed'>

const NEXT: Readonly<Record<OrchestratorState, readonly OrchestratorState[]>> = {
  idle: ['fetched-source'],
  'fetched-source': ['verified-source'],
  'verified-source': ['patched'],
  patched: ['verified-patched'],
  'verified-patched': ['transferred'],
  'undo-idle': ['validated-backup'],
  'validated-backup': ['transferred'],
  transferred: ['verified-remote'],
  'verified-remote': ['restarted'],
  restarted: ['done'],
  done: [],
  failed: [],
}

export function isTerminal(state: OrchestratorState): state is TerminalState {
  return state === 'done' || state === 'failed'
}

/** Whether a run may move from `from` to `to`. */
export function canTransition(from: OrchestratorState, to: OrchestratorState): boolean {
  if (to === 'failed') return !isTerminal(from)
  return NEXT[from].includes(to)
}

/** The state a run of `mode` starts in. */
export function initialState(mode: SessionMode): OrchestratorState {
  return mode === 'patch' ? 'idle' : 'undo-idle'
}
