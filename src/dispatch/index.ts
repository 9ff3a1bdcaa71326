export { DispatchScheduler, partition } from './scheduler';
export type { SchedulerOptions, WorkAssignment, RunSummary, EligibilityResult, FileFailure } from './scheduler';
export { FileTranslator } from './fileTranslator';
export type { TextTranslator, FileTranslationResult } from './fileTranslator';
export { WorkerContext } from './worker';
export type { WorkerProgressSnapshot } from './worker';
