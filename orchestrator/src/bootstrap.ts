import { runtimeConfig, type RuntimeConfig } from './config.js';
import { logger } from './logger.js';
import { createGenerationBackend, type BackendOverrides } from './backends/index.js';
import { InMemoryJobStore, type JobStore } from './storage/jobStore.js';
import { MongoJobStore } from './storage/mongoJobStore.js';
import { createFailureNotifier } from './telegram.js';
import { VideoGenerationService } from './videoService.js';

export function createJobStore(config: Pick<RuntimeConfig, 'MONGODB_URI' | 'MONGODB_DATABASE'>): JobStore {
  if (!config.MONGODB_URI) {
    logger.warn('MONGODB_URI not configured, jobs and sessions are kept in memory only');
    return new InMemoryJobStore();
  }
  return new MongoJobStore({
    mongoUri: config.MONGODB_URI,
    databaseName: config.MONGODB_DATABASE
  });
}

export interface VideoServiceRuntime {
  service: VideoGenerationService;
  store: JobStore;
}

export async function createVideoService(
  config: RuntimeConfig = runtimeConfig,
  overrides: BackendOverrides = {}
): Promise<VideoServiceRuntime> {
  const store = createJobStore(config);
  await store.connect();

  const backend = createGenerationBackend(config, overrides);
  const service = new VideoGenerationService({
    store,
    backend,
    notifier: createFailureNotifier(config)
  });

  logger.info({ mode: backend.mode, videoDir: config.VIDEO_STORAGE_PATH }, 'Video service ready');
  return { service, store };
}
