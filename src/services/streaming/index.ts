export { ChunkBuffer } from './ChunkBuffer';
export { WindowScheduler } from './WindowScheduler';
export type { WindowSchedulerOptions } from './WindowScheduler';
export { TranscriptReconciler, DEFAULT_RECONCILER_OPTIONS, longestSuffixPrefix } from './TranscriptReconciler';
export type { ReconcilerOptions, ReconcileResult } from './TranscriptReconciler';
export { SessionChannel } from './SessionChannel';
export { SessionRegistry } from './SessionRegistry';
export type { Session } from './SessionRegistry';
export { SessionManager } from './SessionManager';
export type { SessionManagerOptions, SessionTimingConfig, SweepResult } from './SessionManager';
export * from './errors';
