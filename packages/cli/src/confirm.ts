import * as readline from 'node:readline'
import type { ConfirmationInfo } from './types.js'

const GENERAL_WARNINGS = [
  'Keep the device unlocked, awake and connected until devpatch has finished.',
  'You use this tool at your own risk. Interrupting it while the new binary is being installed can leave the device unusable until it is restored.',
]

/**
 * Build the lines shown before a run writes to the device.
 *
 * @internal
 */
export function confirmationLines(info: ConfirmationInfo): string[] {
  const action = info.mode === 'patch' ? 'Patch' : 'Undo patch'
  const backup = info.mode === 'patch' ? 'Backup to' : 'Restore from'
  const lines = [
    `${action}: ${info.profile}`,
    `Device:     ${info.device}`,
    `${backup}: ${info.backupPath}`,
    '',
  ]
  const warnings = info.mode === 'patch' ? [...info.warnings, ...GENERAL_WARNINGS] : GENERAL_WARNINGS
  for (const warning of warnings) {
    lines.push(`  ! ${warning}`)
  }
  lines.push('', 'Proceed? [y/N]')
  return lines
}

/**
 * Display the disclaimers and wait for the operator's answer.
 *
 * @param info - What the run is about to do.
 * @returns `true` if the operator confirms, `false` otherwise.
 * @throws If stdin is not a TTY.
 *
 * @internal
 */
export async function promptConfirmation(info: ConfirmationInfo): Promise<boolean> {
  if (!process.stdin.isTTY) {
    throw new Error('Confirmation requires an interactive terminal. Run this command in a terminal or pass --yes.')
  }

  process.stderr.write(confirmationLines(info).join('\n') + '\n')

  const answer = await readLine()
  return ['y', 'yes'].includes(answer.trim().toLowerCase())
}

function readLine(): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stderr,
    })
    rl.question('', (answer) => {
      rl.close()
      resolve(answer)
    })
  })
}
