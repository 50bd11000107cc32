/**
 * Formatted output helpers for CLI display.
 *
 * @internal
 */

import type { Failure, OrchestratorEvent, OrchestratorState } from 'devpatch'

/** Check if stdout is a TTY at call time (not module load time). */
function isTTY(): boolean {
  return process.stdout.isTTY ?? false
}

/** Wrap text in ANSI bold if stdout is a TTY. */
export function bold(text: string): string {
  return isTTY() ? `\x1b[1m${text}\x1b[22m` : text
}

/** Wrap text in ANSI dim if stdout is a TTY. */
export function dim(text: string): string {
  return isTTY() ? `\x1b[2m${text}\x1b[22m` : text
}

/** Format an error for display on stderr. */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`
  }
  return String(err)
}

const STATE_LABELS: Partial<Record<OrchestratorState, string>> = {
  'fetched-source': 'Copied the binary from the device',
  'verified-source': 'Device binary verified',
  patched: 'Patch applied',
  'verified-patched': 'Patched binary verified',
  'validated-backup': 'Backup verified',
  transferred: 'New binary in place',
  'verified-remote': 'Installed binary verified',
  restarted: 'Service restarted',
}

/** A progress line to print and the stream it belongs on. */
export interface EventLine {
  stream: 'stdout' | 'stderr'
  text: string
}

/**
 * Render an orchestrator event as one line, or `undefined` for events that
 * are not shown.
 */
export function formatEvent(event: OrchestratorEvent): EventLine | undefined {
  switch (event.type) {
    case 'info':
      return { stream: 'stdout', text: event.message }
    case 'warning':
      return { stream: 'stderr', text: `Warning: ${event.message}` }
    case 'transition': {
      const label = STATE_LABELS[event.to]
      return label === undefined ? undefined : { stream: 'stdout', text: dim(`  ✓ ${label}`) }
    }
  }
}

/** Render a failed run for stderr. */
export function formatFailure(failure: Failure): string {
  const lines = [`Error: ${failure.message}`]
  for (const step of failure.guidance) {
    lines.push(`  → ${step}`)
  }
  return lines.join('\n')
}
