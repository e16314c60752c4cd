export { runPipeline, type PipelineOptions } from './pipeline.js';
export { CompletionDetector, type SkipReason } from './detector.js';
export { Summary, type StepRecord, type StepStatus } from './summary.js';
export { EventLog, formatStepEvent, type StepEvent, type LoggedStepEvent } from './event-log.js';
export { runPreflight, assertClusterDirAvailable, validatePullSecret, type PreflightOptions } from './preflight.js';
export { saveInstallMetadataBridge, backupInstallConfigBridge } from './bridges.js';
