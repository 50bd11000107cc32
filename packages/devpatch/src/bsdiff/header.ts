/**
 * BSDIFF40 payload header.
 *
 * Layout, all integers 8-byte little-endian sign-magnitude:
 *
 * ```
 *  0  "BSDIFF40"
 *  8  length of the bzip2 control block
 * 16  length of the bzip2 diff block
 * 24  length of the output
 * 32  control block, diff block, extra block (to end of payload)
 * ```
 */

import { ok, err } from '../types.js'
import type { Result } from '../types.js'

export const BSDIFF_MAGIC = 'BSDIFF40'
export const HEADER_SIZE = 32
/** Largest output a payload may declare: 256 MiB. */
export const MAX_OUTPUT_LENGTH = 0x1000_0000

/** Why a payload could not be applied. */
export type PatchErrorKind = 'malformed-payload' | 'length-mismatch'

/** @public */
export interface PatchError {
  kind: PatchErrorKind
  message: string
}

/** Parsed header of a BSDIFF40 payload. */
export interface PatchHeader {
  algorithm: typeof BSDIFF_MAGIC
  controlLength: number
  diffLength: number
  outputLength: number
}

export function malformed(message: string): PatchError {
  return { kind: 'malformed-payload', message }
}

export function lengthMismatch(message: string): PatchError {
  return { kind: 'length-mismatch', message }
}

/**
 * Decode the sign-magnitude integer at `offset`.
 * Returns `undefined` if it lies outside `bytes` or is not a safe integer.
 */
export function readOfftin(bytes: Uint8Array, offset: number): number | undefined {
  if (offset < 0 || offset + 8 > bytes.length) return undefined
  const view = new DataView(bytes.buffer, bytes.byteOffset + offset, 8)
  const low = view.getUint32(0, true)
  const highWord = view.getUint32(4, true)
  const magnitude = (highWord & 0x7fffffff) * 0x1_0000_0000 + low
  if (!Number.isSafeInteger(magnitude)) return undefined
  if (magnitude === 0) return 0
  return (highWord & 0x80000000) !== 0 ? -magnitude : magnitude
}

/**
 * Validate and parse the header of `payload`. Checks the block lengths
 * against the payload size but does not decompress anything.
 */
export function readPatchHeader(payload: Uint8Array): Result<PatchHeader, PatchError> {
  if (payload.length < HEADER_SIZE) {
    return err(malformed(`Payload is ${String(payload.length)} bytes, shorter than the ${String(HEADER_SIZE)}-byte header`))
  }

  const magic = Buffer.from(payload.buffer, payload.byteOffset, 8).toString('latin1')
  if (magic !== BSDIFF_MAGIC) {
    return err(malformed(`Unknown payload format "${magic}", expected ${BSDIFF_MAGIC}`))
  }

  const controlLength = readOfftin(payload, 8)
  const diffLength = readOfftin(payload, 16)
  const outputLength = readOfftin(payload, 24)
  if (controlLength === undefined || diffLength === undefined || outputLength === undefined) {
    return err(malformed('Header lengths are out of range'))
  }
  if (controlLength < 0 || diffLength < 0 || outputLength < 0) {
    return err(malformed('Header declares a negative length'))
  }
  if (outputLength > MAX_OUTPUT_LENGTH) {
    return err(
      malformed(`Header declares ${String(outputLength)} output bytes, more than the ${String(MAX_OUTPUT_LENGTH)} allowed`),
    )
  }
  if (HEADER_SIZE + controlLength + diffLength > payload.length) {
    return err(
      malformed(
        `Header declares ${String(controlLength + diffLength)} bytes of control and diff data but the payload carries ${String(payload.length - HEADER_SIZE)}`,
      ),
    )
  }

  return ok({ algorithm: BSDIFF_MAGIC, controlLength, diffLength, outputLength })
}
