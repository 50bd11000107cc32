import { describe, it, expect } from 'vitest'
import { applyPatch } from '../../../src/bsdiff/apply.js'
import { BinaryImage } from '../../../src/image.js'
import { payload, sourceImage, SOURCE_MD5 } from '../../helpers/fixtures.js'

describe('applyPatch', () => {
  it('reconstructs a single-byte change', () => {
    const fixture = payload('branchFlip')
    const result = applyPatch(sourceImage(), fixture.bytes)
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.length).toBe(2048)
      expect(result.value.digest).toBe('2ce4c534626692acf072b624fc4c5549')
      expect(result.value.bytes[0x100]).toBe(0x0a)
      expect(result.value.bytes[0xff]).toBe(sourceImage().bytes[0xff])
    }
  })

  it('appends bytes from the extra block', () => {
    const result = applyPatch(sourceImage(), payload('appendTrailer').bytes)
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.length).toBe(2064)
      expect(result.value.digest).toBe('bcf005ef07b0abdb458029033c54d374')
      expect(Buffer.from(result.value.bytes.subarray(2048)).toString('latin1')).toBe('DEVPATCH-TRAILER')
    }
  })

  it('follows negative seeks in the control data', () => {
    const result = applyPatch(sourceImage(), payload('rotateHalves').bytes)
    expect(result.ok).toBe(true)
    if (result.ok) {
      // the source repeats every 256 bytes, so swapping its halves reproduces it
      expect(result.value.digest).toBe(SOURCE_MD5)
    }
  })

  it('is deterministic', () => {
    const fixture = payload('branchFlip')
    const first = applyPatch(sourceImage(), fixture.bytes)
    const second = applyPatch(sourceImage(), fixture.bytes)
    expect(first.ok && second.ok).toBe(true)
    if (first.ok && second.ok) {
      expect(first.value.equals(second.value)).toBe(true)
    }
  })

  it('does not modify the input image', () => {
    const input = sourceImage()
    applyPatch(input, payload('branchFlip').bytes)
    expect(input.digest).toBe(SOURCE_MD5)
  })

  it('reports length-mismatch when control data ends before the output is complete', () => {
    const result = applyPatch(sourceImage(), payload('shortControl').bytes)
    expect(result).toEqual({
      ok: false,
      error: { kind: 'length-mismatch', message: 'Control data ends after 1024 of 2048 output bytes' },
    })
  })

  it('reports length-mismatch when a run overruns the declared output', () => {
    const result = applyPatch(sourceImage(), payload('controlOverrun').bytes)
    expect(result).toEqual({
      ok: false,
      error: { kind: 'length-mismatch', message: 'Diff run of 4096 bytes at 0 overruns the 2048-byte output' },
    })
  })

  it('reports malformed-payload for a bad header', () => {
    const result = applyPatch(sourceImage(), Buffer.from('not a patch at all, just some text'))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('malformed-payload')
    }
  })

  it('reports malformed-payload when a block is not bzip2', () => {
    const bytes = payload('branchFlip').bytes
    // overwrite the control block's "BZh" signature
    bytes.fill(0, 32, 35)
    const result = applyPatch(sourceImage(), bytes)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('malformed-payload')
      expect(result.error.message).toMatch(/^Control block is not a valid bzip2 stream/)
    }
  })

  it('applies a payload to whatever input it is given', () => {
    // binding a payload to its source is the caller's job
    const result = applyPatch(new BinaryImage(new Uint8Array(2048)), payload('branchFlip').bytes)
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.length).toBe(2048)
      expect(result.value.digest).not.toBe('2ce4c534626692acf072b624fc4c5549')
    }
  })

  it('reports malformed-payload for an oversized output instead of allocating it', () => {
    const bytes = payload('branchFlip').bytes
    bytes.fill(0, 24, 32)
    bytes[29] = 0x01
    const result = applyPatch(sourceImage(), bytes)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('malformed-payload')
    }
  })
})
