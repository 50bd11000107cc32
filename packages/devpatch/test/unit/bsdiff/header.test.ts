import { describe, it, expect } from 'vitest'
import { HEADER_SIZE, MAX_OUTPUT_LENGTH, readOfftin, readPatchHeader } from '../../../src/bsdiff/header.js'
import { payload } from '../../helpers/fixtures.js'

describe('readOfftin', () => {
  it('decodes a positive value', () => {
    expect(readOfftin(new Uint8Array([0x00, 0x08, 0, 0, 0, 0, 0, 0]), 0)).toBe(2048)
  })

  it('decodes a negative value from the sign bit', () => {
    expect(readOfftin(new Uint8Array([0x00, 0x08, 0, 0, 0, 0, 0, 0x80]), 0)).toBe(-2048)
  })

  it('decodes the high word', () => {
    expect(readOfftin(new Uint8Array([0, 0, 0, 0, 1, 0, 0, 0]), 0)).toBe(0x1_0000_0000)
  })

  it('returns 0, not -0, for negative zero', () => {
    expect(Object.is(readOfftin(new Uint8Array([0, 0, 0, 0, 0, 0, 0, 0x80]), 0), 0)).toBe(true)
  })

  it('reads at an offset', () => {
    expect(readOfftin(new Uint8Array([0xff, 7, 0, 0, 0, 0, 0, 0, 0]), 1)).toBe(7)
  })

  it('returns undefined past the end of the buffer', () => {
    expect(readOfftin(new Uint8Array(8), 1)).toBeUndefined()
    expect(readOfftin(new Uint8Array(8), -1)).toBeUndefined()
  })

  it('returns undefined for magnitudes beyond the safe integer range', () => {
    expect(readOfftin(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x7f]), 0)).toBeUndefined()
  })
})

describe('readPatchHeader', () => {
  it('parses the header of a valid payload', () => {
    const result = readPatchHeader(payload('branchFlip').bytes)
    expect(result).toEqual({
      ok: true,
      value: { algorithm: 'BSDIFF40', controlLength: 42, diffLength: 46, outputLength: 2048 },
    })
  })

  it('rejects a payload shorter than the header', () => {
    const result = readPatchHeader(new Uint8Array(HEADER_SIZE - 1))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('malformed-payload')
      expect(result.error.message).toContain('shorter than the 32-byte header')
    }
  })

  it('rejects an unknown magic', () => {
    const bytes = payload('branchFlip').bytes
    bytes.set(Buffer.from('BSDIFF41'), 0)
    const result = readPatchHeader(bytes)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toEqual({
        kind: 'malformed-payload',
        message: 'Unknown payload format "BSDIFF41", expected BSDIFF40',
      })
    }
  })

  it('rejects a negative block length', () => {
    const bytes = payload('branchFlip').bytes
    bytes[15] = 0x80
    const result = readPatchHeader(bytes)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe('Header declares a negative length')
    }
  })

  it('rejects block lengths larger than the payload', () => {
    const bytes = payload('branchFlip').bytes
    // control length 0x1000
    bytes[8] = 0x00
    bytes[9] = 0x10
    const result = readPatchHeader(bytes)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('malformed-payload')
      expect(result.error.message).toBe(
        'Header declares 4142 bytes of control and diff data but the payload carries 102',
      )
    }
  })

  it('rejects an output length above the limit', () => {
    const bytes = payload('branchFlip').bytes
    // output length 2^40
    bytes.fill(0, 24, 32)
    bytes[29] = 0x01
    const result = readPatchHeader(bytes)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toEqual({
        kind: 'malformed-payload',
        message: 'Header declares 1099511627776 output bytes, more than the 268435456 allowed',
      })
    }
  })

  it('accepts an output length at the limit', () => {
    const bytes = payload('branchFlip').bytes
    bytes.fill(0, 24, 32)
    bytes[27] = 0x10
    const result = readPatchHeader(bytes)
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.outputLength).toBe(MAX_OUTPUT_LENGTH)
    }
  })
})
