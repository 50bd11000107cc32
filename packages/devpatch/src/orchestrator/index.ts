export { PatchOrchestrator, STAGING_SUFFIX } from './orchestrator.js'
export type { OrchestratorOptions, OrchestratorEvent, RunReport, RunSummary } from './orchestrator.js'
export { canTransition, initialState, isTerminal } from './states.js'
export type { OrchestratorState, TerminalState } from './states.js'
export { exitCodeFor } from './failure.js'
export type { Failure, FailureKind } from './failure.js'
export { readBackup, writeBackup } from './backup.js'
export type { BackupStatus } from './backup.js'
