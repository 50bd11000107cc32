/**
 * devpatch: verified binary patching of a networked device over SSH.
 *
 * @packageDocumentation
 */

export { DevpatchError, ConfigError, ProfileError, DeviceBusyError } from './errors.js'

export { ok, err } from './types.js'
export type {
  Result,
  SessionMode,
  DeviceTarget,
  Session,
  PreflightCheckStatus,
  PreflightCheck,
  PreflightResult,
} from './types.js'

export { BinaryImage } from './image.js'

export { computeDigest, isDigest, normalizeDigest, verifyDigest, parseDigestOutput } from './checksum/index.js'
export type { ExpectedDigest, Digestible } from './checksum/index.js'

export { applyPatch, readPatchHeader, readOfftin, BSDIFF_MAGIC, HEADER_SIZE, MAX_OUTPUT_LENGTH } from './bsdiff/index.js'
export type { PatchHeader, PatchError, PatchErrorKind } from './bsdiff/index.js'

export {
  ProfileRegistry,
  DEFAULT_PROFILE_ID,
  parseProfile,
  loadProfileFile,
  loadProfileDirectory,
} from './profile/index.js'
export type { PatchProfile } from './profile/index.js'

export { SshChannel } from './channel/index.js'
export type { RemoteChannel, ChannelFailure, ChannelOperation, RemoteExecResult } from './channel/index.js'

export {
  PatchOrchestrator,
  STAGING_SUFFIX,
  canTransition,
  initialState,
  isTerminal,
  exitCodeFor,
  readBackup,
  writeBackup,
} from './orchestrator/index.js'
export type {
  OrchestratorOptions,
  OrchestratorEvent,
  RunReport,
  RunSummary,
  OrchestratorState,
  TerminalState,
  Failure,
  FailureKind,
  BackupStatus,
} from './orchestrator/index.js'

export { DEFAULT_HOST, getDefaultConfigDir, getLockDir, defaultConfig, validateConfig, loadConfig } from './config.js'
export type { DevpatchConfig } from './config.js'

export { acquireDeviceLock, clearDeviceLock, lockPathFor } from './lock.js'
export type { DeviceLock } from './lock.js'

export { runDoctor, checkSsh, checkScp } from './doctor/index.js'
