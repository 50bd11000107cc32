/**
 * Registry of known patch profiles.
 */

import { ProfileError } from '../errors.js'
import { loadProfileDirectory, parseProfile } from './loader.js'
import type { PatchProfile } from './types.js'
import webui1701 from '../../profiles/xochitl-webui-1.7.0.1.json' with { type: 'json' }

/** Profile files shipped with the package, keyed by file name. */
const BUILTIN_PROFILE_FILES: Readonly<Record<string, unknown>> = {
  'xochitl-webui-1.7.0.1.json': webui1701,
}

/** Profile used when neither the config nor the command line names one. */
export const DEFAULT_PROFILE_ID = 'xochitl-webui-1.7.0.1'

/**
 * Maps profile ids to profiles.
 * @public
 */
export class ProfileRegistry {
  readonly #profiles = new Map<string, PatchProfile>()

  /**
   * Create a registry holding the built-in profiles plus those found in
   * `extraDirs`. A later profile with an id already registered is rejected.
   */
  static async load(extraDirs: readonly string[] = []): Promise<ProfileRegistry> {
    const registry = ProfileRegistry.builtin()
    for (const dir of extraDirs) {
      for (const profile of await loadProfileDirectory(dir)) {
        registry.register(profile)
      }
    }
    return registry
  }

  /** Create a registry holding only the built-in profiles. */
  static builtin(): ProfileRegistry {
    const registry = new ProfileRegistry()
    for (const [file, raw] of Object.entries(BUILTIN_PROFILE_FILES)) {
      registry.register(parseProfile(raw, `builtin:${file}`))
    }
    return registry
  }

  /**
   * Add a profile.
   * @throws {@link ProfileError} if the id is already registered
   */
  register(profile: PatchProfile): void {
    if (this.#profiles.has(profile.id)) {
      throw new ProfileError(`Duplicate profile id: ${profile.id}`, profile.id)
    }
    this.#profiles.set(profile.id, profile)
  }

  /**
   * Look up a profile by id.
   * @throws {@link ProfileError} if the id is unknown
   */
  get(id: string): PatchProfile {
    const profile = this.#profiles.get(id)
    if (profile === undefined) {
      throw new ProfileError(
        `Unknown profile: ${id}. Available profiles: ${this.ids().join(', ')}`,
        id,
      )
    }
    return profile
  }

  ids(): string[] {
    return Array.from(this.#profiles.keys())
  }

  list(): PatchProfile[] {
    return Array.from(this.#profiles.values())
  }
}
