/**
 * Configuration loading, validation, and defaults for devpatch.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as os from 'node:os'
import { ConfigError } from './errors.js'
import { DEFAULT_PROFILE_ID } from './profile/registry.js'
import type { DeviceTarget } from './types.js'

/**
 * Contents of `config.json`.
 * @public
 */
export interface DevpatchConfig {
  version: 1
  /** Device to connect to. */
  target: DeviceTarget
  /** Profile applied when the command line names none. */
  profile: string
  /** Where a patch run keeps the original binary. */
  backupPath: string
  /** Directories searched for additional profile files. */
  profileDirs: string[]
}

/** USB network address of a reMarkable tablet. */
export const DEFAULT_HOST = '10.11.99.1'

/** Return the platform-appropriate default config directory. */
export function getDefaultConfigDir(): string {
  const override = process.env.DEVPATCH_CONFIG_DIR
  if (override !== undefined && override !== '') {
    return override
  }
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA
    if (appData !== undefined) {
      return path.join(appData, 'devpatch')
    }
    return path.join(os.homedir(), 'AppData', 'Roaming', 'devpatch')
  }
  return path.join(os.homedir(), '.config', 'devpatch')
}

/** Directory holding device lock files. */
export function getLockDir(configDir: string = getDefaultConfigDir()): string {
  return path.join(configDir, 'locks')
}

/** Default configuration when no config file exists. */
export function defaultConfig(): DevpatchConfig {
  return {
    version: 1,
    target: { host: DEFAULT_HOST, user: 'root' },
    profile: DEFAULT_PROFILE_ID,
    backupPath: './xochitl_BACKUP',
    profileDirs: [],
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function expandHome(p: string): string {
  if (p === '~' || p.startsWith('~/')) {
    return path.join(os.homedir(), p.slice(1))
  }
  return p
}

function validateTarget(raw: unknown): DeviceTarget {
  const target = defaultConfig().target
  if (raw === undefined) return target
  if (!isObject(raw)) {
    throw new ConfigError('Config target must be an object')
  }

  if (raw.host !== undefined) {
    if (typeof raw.host !== 'string' || raw.host.trim() === '') {
      throw new ConfigError('Config target.host must be a non-empty string')
    }
    target.host = raw.host
  }
  if (raw.user !== undefined) {
    if (typeof raw.user !== 'string' || raw.user.trim() === '') {
      throw new ConfigError('Config target.user must be a non-empty string')
    }
    target.user = raw.user
  }
  if (raw.port !== undefined) {
    if (typeof raw.port !== 'number' || !Number.isInteger(raw.port) || raw.port < 1 || raw.port > 65535) {
      throw new ConfigError('Config target.port must be an integer between 1 and 65535')
    }
    target.port = raw.port
  }
  if (raw.identityFile !== undefined) {
    if (typeof raw.identityFile !== 'string' || raw.identityFile.trim() === '') {
      throw new ConfigError('Config target.identityFile must be a non-empty string')
    }
    target.identityFile = expandHome(raw.identityFile)
  }
  if (raw.connectTimeoutSeconds !== undefined) {
    const timeout = raw.connectTimeoutSeconds
    if (typeof timeout !== 'number' || !Number.isInteger(timeout) || timeout <= 0) {
      throw new ConfigError('Config target.connectTimeoutSeconds must be a positive integer')
    }
    target.connectTimeoutSeconds = timeout
  }
  return target
}

/**
 * Validate an unknown value as a DevpatchConfig, throwing on invalid
 * structure. Keys left out take their default values.
 */
export function validateConfig(config: unknown): DevpatchConfig {
  if (!isObject(config)) {
    throw new ConfigError('Config must be an object')
  }

  if (config.version !== 1) {
    throw new ConfigError('Config version must be 1')
  }

  const result = defaultConfig()
  result.target = validateTarget(config.target)

  if (config.profile !== undefined) {
    if (typeof config.profile !== 'string' || config.profile.trim() === '') {
      throw new ConfigError('Config profile must be a non-empty string')
    }
    result.profile = config.profile
  }

  if (config.backupPath !== undefined) {
    if (typeof config.backupPath !== 'string' || config.backupPath.trim() === '') {
      throw new ConfigError('Config backupPath must be a non-empty string')
    }
    result.backupPath = expandHome(config.backupPath)
  }

  if (config.profileDirs !== undefined) {
    if (!Array.isArray(config.profileDirs)) {
      throw new ConfigError('Config profileDirs must be an array')
    }
    for (const [i, dir] of Array.from(config.profileDirs).entries()) {
      if (typeof dir !== 'string') {
        throw new ConfigError(`Config profileDirs[${String(i)}] must be a string`)
      }
      result.profileDirs.push(expandHome(dir))
    }
  }

  return result
}

/**
 * Load the devpatch config from disk, falling back to defaults if the file
 * does not exist.
 *
 * @param configDir - Directory containing config.json. Defaults to platform-appropriate path.
 */
export async function loadConfig(configDir?: string): Promise<DevpatchConfig> {
  const dir = configDir ?? getDefaultConfigDir()
  const configPath = path.join(dir, 'config.json')

  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      return defaultConfig()
    }
    throw new ConfigError(`Cannot read config file at ${configPath}`, configPath)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new ConfigError(`Failed to parse config file at ${configPath}`, configPath)
  }

  try {
    return validateConfig(parsed)
  } catch (e) {
    if (e instanceof ConfigError) {
      throw new ConfigError(`${e.message} (in ${configPath})`, configPath)
    }
    throw e
  }
}
