/**
 * Content digests for binary images.
 */

import * as crypto from 'node:crypto'

/**
 * A named digest bound to one known-good binary version.
 * @public
 */
export interface ExpectedDigest {
  /** What the digest identifies, e.g. `'source'` or `'patched'`. */
  label: string
  /** Lower-case hex MD5. */
  value: string
}

/** Minimal view of an image the verifier needs. */
export interface Digestible {
  readonly digest: string
}

const DIGEST_PATTERN = /^[0-9a-f]{32}$/i
const DIGEST_TOKEN = /\b([0-9a-f]{32})\b/i

/**
 * Compute the MD5 digest of `bytes`.
 *
 * @remarks
 * MD5 is what the deployed tooling and the device's `md5sum` produce, so
 * digests stay comparable with both.
 */
export function computeDigest(bytes: Uint8Array): string {
  return crypto.createHash('md5').update(bytes).digest('hex')
}

/** Whether `value` looks like a hex MD5 digest. */
export function isDigest(value: string): boolean {
  return DIGEST_PATTERN.test(value)
}

/** Lower-case and trim a digest string for comparison. */
export function normalizeDigest(value: string): string {
  return value.trim().toLowerCase()
}

/**
 * Compare an image's digest with an expected one. Returns `false` on a
 * mismatch; the caller decides whether that is fatal.
 */
export function verifyDigest(image: Digestible, expected: ExpectedDigest): boolean {
  return normalizeDigest(image.digest) === normalizeDigest(expected.value)
}

/**
 * Extract the digest from `md5sum` output (`<digest>  <path>`).
 * Returns `undefined` when the output carries no digest.
 */
export function parseDigestOutput(stdout: string): string | undefined {
  const match = DIGEST_TOKEN.exec(stdout.trim())
  return match?.[1]?.toLowerCase()
}
