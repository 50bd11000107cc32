/**
 * Preflight checks for the local tools devpatch shells out to.
 */

import { execCommandFull } from '../util/exec.js'
import type { PreflightCheck } from '../types.js'

const CHECK_TIMEOUT_MS = 5000

function firstLine(text: string): string | undefined {
  const line = text.trim().split('\n')[0]
  return line === undefined || line === '' ? undefined : line
}

/**
 * Check that the OpenSSH client is present.
 * @internal
 */
export async function checkSsh(): Promise<PreflightCheck> {
  const name = 'ssh'
  try {
    // ssh -V prints its version on stderr
    const result = await execCommandFull('ssh', ['-V'], { timeoutMs: CHECK_TIMEOUT_MS })
    return { name, status: 'ok', version: firstLine(result.stderr) ?? firstLine(result.stdout) }
  } catch {
    return { name, status: 'missing', reason: 'ssh not found in PATH (install an OpenSSH client)' }
  }
}

/**
 * Check that scp is present.
 * @internal
 */
export async function checkScp(): Promise<PreflightCheck> {
  const name = 'scp'
  try {
    // scp has no version flag; without arguments it prints usage and exits 1,
    // which is enough to know it can be started
    await execCommandFull('scp', [], { timeoutMs: CHECK_TIMEOUT_MS })
    return { name, status: 'ok' }
  } catch {
    return { name, status: 'missing', reason: 'scp not found in PATH (install an OpenSSH client)' }
  }
}
