export { WatcherService } from './WatcherService.js';
export type { WatcherServiceOptions } from './WatcherService.js';
export { DirectoryEventSource } from './DirectoryEventSource.js';
export { EventFilter, DEFAULT_NOISE_PATTERNS } from './EventFilter.js';
export type { NoisePattern } from './EventFilter.js';
export { DispatchGate } from './DispatchGate.js';
export { PipelineRunner } from './JobRunner.js';
export type { JobRunner, PipelineCommand } from './JobRunner.js';
export { OutcomeReporter } from './OutcomeReporter.js';
export { Dispatcher } from './Dispatcher.js';
export { dispatchFile, dispatchDirectory, isSuccess } from './ManualDispatch.js';
export type { BatchSummary, ManualDispatchDeps } from './ManualDispatch.js';
export * from './types.js';
