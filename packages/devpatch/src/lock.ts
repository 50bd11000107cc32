/**
 * Per-device lock files.
 *
 * A run reads the device's binary and then replaces it, so two runs against
 * one device must never overlap. The lock is a file created with `O_EXCL`
 * under the config directory, named after the device address.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { DeviceBusyError } from './errors.js'

/** A held device lock. */
export interface DeviceLock {
  /** Path of the lock file. */
  readonly path: string
  /** Remove the lock file. Safe to call more than once. */
  release(): Promise<void>
}

/** Contents written into a lock file. */
interface LockRecord {
  pid: number
  device: string
  startedAt: string
}

/** Return the lock file path for `device` inside `lockDir`. */
export function lockPathFor(lockDir: string, device: string): string {
  return path.join(lockDir, `${device.replace(/[^A-Za-z0-9._-]/g, '_')}.lock`)
}

async function readHolderPid(lockPath: string): Promise<number | undefined> {
  try {
    const parsed: unknown = JSON.parse(await fs.readFile(lockPath, 'utf-8'))
    if (typeof parsed === 'object' && parsed !== null && 'pid' in parsed && typeof parsed.pid === 'number') {
      return parsed.pid
    }
  } catch {
    // an unreadable lock file still holds the device
  }
  return undefined
}

/** Whether a process with `pid` is running. EPERM means it runs as another user. */
function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (e) {
    return e instanceof Error && 'code' in e && e.code === 'EPERM'
  }
}

/** Create the lock file. Resolves `false` if it already exists. */
async function createLockFile(lockPath: string, record: LockRecord): Promise<boolean> {
  try {
    await fs.writeFile(lockPath, JSON.stringify(record) + '\n', { flag: 'wx' })
    return true
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'EEXIST') {
      return false
    }
    throw e
  }
}

/**
 * Take the lock for `device`. A lock left by a process that is no longer
 * running is replaced.
 * @throws {@link DeviceBusyError} if another run holds it
 */
export async function acquireDeviceLock(lockDir: string, device: string): Promise<DeviceLock> {
  await fs.mkdir(lockDir, { recursive: true })
  const lockPath = lockPathFor(lockDir, device)

  const record: LockRecord = { pid: process.pid, device, startedAt: new Date().toISOString() }
  if (!(await createLockFile(lockPath, record))) {
    const holderPid = await readHolderPid(lockPath)
    const stale = holderPid !== undefined && !isProcessAlive(holderPid)
    if (stale) {
      await fs.rm(lockPath, { force: true })
    }
    if (!stale || !(await createLockFile(lockPath, record))) {
      const holder = holderPid !== undefined ? ` by process ${String(holderPid)}` : ''
      throw new DeviceBusyError(
        `Device ${device} is locked${holder}. If no other devpatch run is active, remove the lock with "devpatch unlock".`,
        lockPath,
        holderPid,
      )
    }
  }

  let released = false
  return {
    path: lockPath,
    async release() {
      if (released) return
      released = true
      await fs.rm(lockPath, { force: true })
    },
  }
}

/**
 * Remove a stale lock for `device`. Returns `true` if a lock file existed.
 */
export async function clearDeviceLock(lockDir: string, device: string): Promise<boolean> {
  const lockPath = lockPathFor(lockDir, device)
  try {
    await fs.unlink(lockPath)
    return true
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      return false
    }
    throw e
  }
}
