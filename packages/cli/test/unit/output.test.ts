import { describe, it, expect, afterEach } from 'vitest'
import type { Failure } from 'devpatch'
import { formatError, formatEvent, formatFailure } from '../../src/output.js'

describe('formatError', () => {
  it('should format Error instances with name and message', () => {
    const err = new Error('something broke')
    expect(formatError(err)).toBe('Error: something broke')
  })

  it('should format custom error classes', () => {
    class CustomError extends Error {
      constructor(message: string) {
        super(message)
        this.name = 'CustomError'
      }
    }
    expect(formatError(new CustomError('bad'))).toBe('CustomError: bad')
  })

  it('should stringify non-Error values', () => {
    expect(formatError('string error')).toBe('string error')
    expect(formatError(42)).toBe('42')
    expect(formatError(null)).toBe('null')
  })
})

describe('formatEvent', () => {
  afterEach(() => {
    Object.defineProperty(process.stdout, 'isTTY', { value: undefined, configurable: true })
  })

  it('should label shown transitions on stdout', () => {
    Object.defineProperty(process.stdout, 'isTTY', { value: false, configurable: true })
    expect(formatEvent({ type: 'transition', from: 'patched', to: 'verified-patched' })).toEqual({
      stream: 'stdout',
      text: '  ✓ Patched binary verified',
    })
  })

  it('should skip transitions without a label', () => {
    expect(formatEvent({ type: 'transition', from: 'idle', to: 'failed' })).toBeUndefined()
  })

  it('should print info on stdout and warnings on stderr', () => {
    expect(formatEvent({ type: 'info', message: 'Backup created.' })).toEqual({
      stream: 'stdout',
      text: 'Backup created.',
    })
    expect(formatEvent({ type: 'warning', message: 'Could not remove the staging file' })).toEqual({
      stream: 'stderr',
      text: 'Warning: Could not remove the staging file',
    })
  })
})

describe('formatFailure', () => {
  it('should print the message followed by each guidance line', () => {
    const failure: Failure = {
      kind: 'version-mismatch',
      stage: 'fetched-source',
      message: 'The device is running an incompatible xochitl version',
      deviceModified: false,
      guidance: ['No changes have been made to the device.'],
    }
    expect(formatFailure(failure)).toBe(
      'Error: The device is running an incompatible xochitl version\n' +
        '  → No changes have been made to the device.',
    )
  })
})
