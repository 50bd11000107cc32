/**
 * Doctor runner: runs the preflight checks and aggregates results.
 */

import { checkScp, checkSsh } from './checks.js'
import type { PreflightCheck, PreflightResult } from '../types.js'

/** All checks are required. */
const CHECKS: (() => Promise<PreflightCheck>)[] = [checkSsh, checkScp]

/**
 * Run all preflight checks and aggregate the results.
 */
export async function runDoctor(): Promise<PreflightResult> {
  const checks = await Promise.all(CHECKS.map((check) => check()))

  const nextSteps: string[] = []
  for (const result of checks) {
    if (result.status === 'missing') {
      const detail = result.reason !== undefined ? ` (${result.reason})` : ''
      nextSteps.push(`Install missing required dependency: ${result.name}${detail}`)
    }
  }

  return { checks, ready: nextSteps.length === 0, nextSteps }
}
