import type { SessionMode } from 'devpatch'

/** Options parsed from the `devpatch patch` and `devpatch undo` command lines. */
export interface SessionCommandOptions {
  /** Device host name or address; overrides the config file. */
  target?: string | undefined
  /** Login user on the device; overrides the config file. */
  user?: string | undefined
  /** Where the original binary is kept. Required for undo. */
  backup?: string | undefined
  /** Profile to apply; overrides the config file. */
  profile?: string | undefined
  /** Skip the confirmation prompt. */
  yes?: boolean | undefined
}

/** Information displayed in the confirmation prompt. */
export interface ConfirmationInfo {
  mode: SessionMode
  /** Device address, e.g. `root@10.11.99.1`. */
  device: string
  /** Description of the profile being applied or undone. */
  profile: string
  /** Local backup path written (patch) or read (undo). */
  backupPath: string
  /** Disclaimers specific to the profile. Shown for patch runs only. */
  warnings: string[]
}
