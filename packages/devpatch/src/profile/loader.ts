/**
 * Parsing and validation of profile files.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { isDigest, normalizeDigest } from '../checksum/digest.js'
import { readPatchHeader } from '../bsdiff/header.js'
import { ProfileError } from '../errors.js'
import type { PatchProfile } from './types.js'

const PROFILE_ID = /^[a-z0-9][a-z0-9._-]*$/
const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function requireString(raw: Record<string, unknown>, key: string, id: string): string {
  const value = raw[key]
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ProfileError(`Profile ${id}: ${key} must be a non-empty string`, id)
  }
  return value
}

function requireDigest(raw: Record<string, unknown>, key: string, id: string): string {
  const value = requireString(raw, key, id)
  if (!isDigest(value)) {
    throw new ProfileError(`Profile ${id}: ${key} must be a 32-character hex MD5 digest`, id)
  }
  return normalizeDigest(value)
}

/**
 * Validate an unknown value as a profile file and decode its payload.
 *
 * @param origin - Where the value came from, used in error messages.
 */
export function parseProfile(raw: unknown, origin: string): PatchProfile {
  if (!isObject(raw)) {
    throw new ProfileError(`Profile at ${origin} must be an object`, origin)
  }
  if (typeof raw.id !== 'string' || !PROFILE_ID.test(raw.id)) {
    throw new ProfileError(
      `Profile at ${origin}: id must be lower-case letters, digits, ".", "_" or "-"`,
      origin,
    )
  }
  const id = raw.id

  const remotePath = requireString(raw, 'remotePath', id)
  if (!/^\/[A-Za-z0-9._/-]+$/.test(remotePath)) {
    throw new ProfileError(`Profile ${id}: remotePath must be an absolute path of [A-Za-z0-9._/-]`, id)
  }
  const service = requireString(raw, 'service', id)
  if (!/^[A-Za-z0-9@._-]+$/.test(service)) {
    throw new ProfileError(`Profile ${id}: service is not a valid unit name`, id)
  }

  const sourceDigest = requireDigest(raw, 'sourceDigest', id)
  const patchedDigest = requireDigest(raw, 'patchedDigest', id)
  if (sourceDigest === patchedDigest) {
    throw new ProfileError(`Profile ${id}: sourceDigest and patchedDigest must differ`, id)
  }

  const warnings: string[] = []
  if (raw.warnings !== undefined) {
    if (!Array.isArray(raw.warnings)) {
      throw new ProfileError(`Profile ${id}: warnings must be an array`, id)
    }
    for (const [i, warning] of Array.from(raw.warnings).entries()) {
      if (typeof warning !== 'string') {
        throw new ProfileError(`Profile ${id}: warnings[${String(i)}] must be a string`, id)
      }
      warnings.push(warning)
    }
  }

  const encoded = requireString(raw, 'payload', id).replace(/\s+/g, '')
  if (!BASE64.test(encoded)) {
    throw new ProfileError(`Profile ${id}: payload must be base64`, id)
  }
  const payload = new Uint8Array(Buffer.from(encoded, 'base64'))
  const header = readPatchHeader(payload)
  if (!header.ok) {
    throw new ProfileError(`Profile ${id}: ${header.error.message}`, id)
  }

  return {
    id,
    description: requireString(raw, 'description', id),
    remotePath,
    service,
    sourceDigest: { label: 'source', value: sourceDigest },
    patchedDigest: { label: 'patched', value: patchedDigest },
    warnings,
    payload,
  }
}

/** Read and parse one profile file. */
export async function loadProfileFile(filePath: string): Promise<PatchProfile> {
  let text: string
  try {
    text = await fs.readFile(filePath, 'utf-8')
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    throw new ProfileError(`Cannot read profile file ${filePath}: ${reason}`, filePath)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    throw new ProfileError(`Failed to parse profile file at ${filePath}`, filePath)
  }
  return parseProfile(parsed, filePath)
}

/** Load every `*.json` profile in `dir`, in file name order. */
export async function loadProfileDirectory(dir: string): Promise<PatchProfile[]> {
  let entries: string[]
  try {
    entries = await fs.readdir(dir)
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    throw new ProfileError(`Cannot read profile directory ${dir}: ${reason}`, dir)
  }
  const files = entries.filter((name) => name.endsWith('.json')).sort()
  const profiles: PatchProfile[] = []
  for (const name of files) {
    profiles.push(await loadProfileFile(path.join(dir, name)))
  }
  return profiles
}
