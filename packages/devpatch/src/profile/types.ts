/**
 * Patch profile types.
 */

import type { ExpectedDigest } from '../checksum/digest.js'

/**
 * Binds one BSDIFF40 payload to the binary version it applies to and the
 * version it produces.
 *
 * @remarks
 * A profile is data. Supporting a new firmware release means adding a profile
 * file, not changing the orchestrator.
 *
 * @public
 */
export interface PatchProfile {
  /** Unique identifier, e.g. `'xochitl-webui-1.7.0.1'`. */
  id: string
  /** One-line summary shown by `devpatch profiles`. */
  description: string
  /** Absolute path of the executable on the device. */
  remotePath: string
  /** systemd unit that runs the executable. */
  service: string
  /** Digest of the unmodified binary the payload was made from. */
  sourceDigest: ExpectedDigest
  /** Digest of the binary the payload produces. */
  patchedDigest: ExpectedDigest
  /** Things the operator must know before applying the patch. */
  warnings: string[]
  /** BSDIFF40 payload. */
  payload: Uint8Array
}
