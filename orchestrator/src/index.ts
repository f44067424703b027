export { runtimeConfig, parseRuntimeConfig, type RuntimeConfig } from './config.js';
export { logger } from './logger.js';
export * from './errors.js';
export type * from './types.js';
export { VideoSession, MAX_SESSION_PHOTOS, type SessionInput } from './session/videoSession.js';
export { SessionRegistry } from './session/sessionRegistry.js';
export { HttpTransferClient, type HttpTransferClientOptions, type TransferClient } from './transferClient.js';
export { JobPoller, systemClock, type Clock, type JobPollerOptions } from './jobPoller.js';
export * from './backends/index.js';
export { GenerationOrchestrator, createJobId, type TransitionListener } from './generationOrchestrator.js';
export { VIDEO_TEMPLATES, expandPromptTemplate, type VideoTemplateKey } from './templates.js';
export { InMemoryJobStore, type JobStatusDetails, type JobStore } from './storage/jobStore.js';
export { MongoJobStore } from './storage/mongoJobStore.js';
export { artifactPath, isValidJobId, writeArtifact } from './storage/artifacts.js';
export { TelegramNotifier, createFailureNotifier, type FailureNotifier, type JobFailureNotice } from './telegram.js';
export { VideoGenerationService, DEFAULT_JOB_LIST_LIMIT, type VideoGenerationServiceOptions } from './videoService.js';
export { createJobStore, createVideoService, type VideoServiceRuntime } from './bootstrap.js';
