/**
 * Local backup of the original binary.
 */

import * as fs from 'node:fs/promises'
import { computeDigest } from '../checksum/digest.js'
import { BinaryImage } from '../image.js'
import { ok, err } from '../types.js'
import type { Result } from '../types.js'

/** `created` when the file was written, `kept` when an identical copy was already there. */
export type BackupStatus = 'created' | 'kept'

function errorCode(e: unknown): unknown {
  return e instanceof Error && 'code' in e ? e.code : undefined
}

function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

/**
 * Save `image` at `backupPath` without ever replacing an existing file.
 *
 * An existing file with the same content counts as success; any other file
 * at that path is left alone and reported.
 */
export async function writeBackup(backupPath: string, image: BinaryImage): Promise<Result<BackupStatus, string>> {
  try {
    await fs.writeFile(backupPath, image.toBuffer(), { flag: 'wx', mode: 0o644 })
    return ok('created')
  } catch (e) {
    if (errorCode(e) !== 'EEXIST') {
      return err(`Cannot write backup to ${backupPath}: ${describeError(e)}`)
    }
  }

  let existing: Buffer
  try {
    existing = await fs.readFile(backupPath)
  } catch (e) {
    return err(`${backupPath} already exists and cannot be read: ${describeError(e)}`)
  }
  if (computeDigest(existing) !== image.digest) {
    return err(`${backupPath} already exists and is not a copy of the device's binary; move it away or choose another backup path`)
  }
  return ok('kept')
}

/** Read a backup file into an image. */
export async function readBackup(backupPath: string): Promise<Result<BinaryImage, string>> {
  try {
    return ok(new BinaryImage(await fs.readFile(backupPath)))
  } catch (e) {
    if (errorCode(e) === 'ENOENT') {
      return err(`No such file: ${backupPath}`)
    }
    return err(`Cannot read backup ${backupPath}: ${describeError(e)}`)
  }
}
