/**
 * BSDIFF40 patch application.
 */

import Bunzip from 'seek-bzip'
import { BinaryImage } from '../image.js'
import { ok, err } from '../types.js'
import type { Result } from '../types.js'
import { HEADER_SIZE, lengthMismatch, malformed, readOfftin, readPatchHeader } from './header.js'
import type { PatchError } from './header.js'

const TRIPLE_SIZE = 24

function inflate(block: Uint8Array, name: string): Result<Uint8Array, PatchError> {
  try {
    return ok(Bunzip.decode(Buffer.from(block.buffer, block.byteOffset, block.byteLength)))
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    return err(malformed(`${name} block is not a valid bzip2 stream: ${reason}`))
  }
}

/**
 * Apply a BSDIFF40 `payload` to `input` and return the reconstructed image.
 *
 * @remarks
 * Pure: the same input and payload always produce the same bytes. Whether the
 * input is the one the payload was made for is not checked here; callers
 * verify the input's digest first.
 *
 * @public
 */
export function applyPatch(input: BinaryImage, payload: Uint8Array): Result<BinaryImage, PatchError> {
  const headerResult = readPatchHeader(payload)
  if (!headerResult.ok) return headerResult
  const { controlLength, diffLength, outputLength } = headerResult.value

  const diffStart = HEADER_SIZE + controlLength
  const extraStart = diffStart + diffLength

  const control = inflate(payload.subarray(HEADER_SIZE, diffStart), 'Control')
  if (!control.ok) return control
  const diff = inflate(payload.subarray(diffStart, extraStart), 'Diff')
  if (!diff.ok) return diff
  const extra = inflate(payload.subarray(extraStart), 'Extra')
  if (!extra.ok) return extra

  const old = input.bytes
  const output = new Uint8Array(outputLength)
  let newPos = 0
  let oldPos = 0
  let controlPos = 0
  let diffPos = 0
  let extraPos = 0

  while (newPos < outputLength) {
    if (controlPos + TRIPLE_SIZE > control.value.length) {
      return err(
        lengthMismatch(`Control data ends after ${String(newPos)} of ${String(outputLength)} output bytes`),
      )
    }
    const add = readOfftin(control.value, controlPos)
    const copy = readOfftin(control.value, controlPos + 8)
    const seek = readOfftin(control.value, controlPos + 16)
    controlPos += TRIPLE_SIZE
    if (add === undefined || copy === undefined || seek === undefined || add < 0 || copy < 0) {
      return err(malformed(`Invalid control triple at offset ${String(controlPos - TRIPLE_SIZE)}`))
    }

    if (newPos + add > outputLength) {
      return err(lengthMismatch(`Diff run of ${String(add)} bytes at ${String(newPos)} overruns the ${String(outputLength)}-byte output`))
    }
    if (diffPos + add > diff.value.length) {
      return err(malformed('Diff block is shorter than the control data requires'))
    }
    for (let i = 0; i < add; i++) {
      let byte = diff.value[diffPos + i] ?? 0
      const oldIndex = oldPos + i
      if (oldIndex >= 0 && oldIndex < old.length) {
        byte = (byte + (old[oldIndex] ?? 0)) & 0xff
      }
      output[newPos + i] = byte
    }
    diffPos += add
    newPos += add
    oldPos += add

    if (newPos + copy > outputLength) {
      return err(lengthMismatch(`Extra run of ${String(copy)} bytes at ${String(newPos)} overruns the ${String(outputLength)}-byte output`))
    }
    if (extraPos + copy > extra.value.length) {
      return err(malformed('Extra block is shorter than the control data requires'))
    }
    output.set(extra.value.subarray(extraPos, extraPos + copy), newPos)
    extraPos += copy
    newPos += copy
    oldPos += seek
  }

  return ok(new BinaryImage(output))
}
