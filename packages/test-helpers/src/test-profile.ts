/**
 * A synthetic profile and matching device for consumer tests.
 */

import { BinaryImage, parseProfile } from 'devpatch'
import type { PatchProfile } from 'devpatch'
import { InMemoryDevice } from './in-memory-device.js'
import testProfileFile from '../fixtures/test-profile.json' with { type: 'json' }

/** Size of the synthetic source binary. */
const TEST_SOURCE_LENGTH = 2048

/**
 * Bytes of the synthetic binary the test profile applies to.
 * @public
 */
export function testSourceImage(): BinaryImage {
  const bytes = new Uint8Array(TEST_SOURCE_LENGTH)
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = (i * 31 + 7) & 0xff
  }
  return new BinaryImage(bytes)
}

/**
 * A profile whose payload turns {@link testSourceImage} into a binary that
 * differs from it in one byte, at offset 0x100.
 * @public
 */
export function createTestProfile(): PatchProfile {
  return parseProfile(testProfileFile, 'test-helpers:test-profile.json')
}

/**
 * Options for {@link createTestDevice}.
 * @public
 */
export interface TestDeviceOptions {
  /** Content installed at the profile's remote path. Defaults to {@link testSourceImage}. */
  binary?: Uint8Array | undefined
  /** Whether the profile's service starts out running. Defaults to `true`. */
  serviceRunning?: boolean | undefined
}

/**
 * An {@link InMemoryDevice} set up for `profile`: its binary installed and
 * its service running.
 * @public
 */
export function createTestDevice(profile: PatchProfile, options: TestDeviceOptions = {}): InMemoryDevice {
  return new InMemoryDevice({
    files: { [profile.remotePath]: options.binary ?? testSourceImage().bytes },
    services: options.serviceRunning === false ? [] : [profile.service],
  })
}
