/**
 * @devpatch/test-helpers: test utilities for devpatch consumers.
 *
 * @packageDocumentation
 */

export { InMemoryDevice } from './in-memory-device.js'
export type { InMemoryDeviceOptions } from './in-memory-device.js'
export { createTestDevice, createTestProfile, testSourceImage } from './test-profile.js'
export type { TestDeviceOptions } from './test-profile.js'
