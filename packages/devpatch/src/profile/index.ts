export { ProfileRegistry, DEFAULT_PROFILE_ID } from './registry.js'
export { parseProfile, loadProfileFile, loadProfileDirectory } from './loader.js'
export type { PatchProfile } from './types.js'
