import type { RuntimeConfig } from '../config.js';
import type { Clock } from '../jobPoller.js';
import { HttpTransferClient } from '../transferClient.js';
import { MockBackend } from './mockBackend.js';
import { RemoteBackend } from './remoteBackend.js';
import type { GenerationBackend } from './types.js';

export { MockBackend, type MockBackendOptions } from './mockBackend.js';
export { RemoteBackend, type RemoteBackendOptions } from './remoteBackend.js';
export type { GenerationBackend, GenerationHooks, GenerationMode, GenerationOutcome, GenerationRequest } from './types.js';

export interface BackendOverrides {
  fetchImpl?: typeof fetch;
  clock?: Clock;
}

type BackendConfig = Pick<
  RuntimeConfig,
  | 'MOCK_MODE'
  | 'MOCK_DELAY_MS'
  | 'GENERATION_API_URL'
  | 'GENERATION_API_KEY'
  | 'VIDEO_STORAGE_PATH'
  | 'VIDEO_DURATION_SECONDS'
  | 'VIDEO_RESOLUTION'
  | 'GENERATION_TIMEOUT_SECONDS'
  | 'POLL_INTERVAL_SECONDS'
  | 'POLL_MAX_CONSECUTIVE_ERRORS'
  | 'REQUEST_TIMEOUT_SECONDS'
  | 'DOWNLOAD_TIMEOUT_SECONDS'
>;

export function createGenerationBackend(config: BackendConfig, overrides: BackendOverrides = {}): GenerationBackend {
  if (config.MOCK_MODE) {
    return new MockBackend({
      videoDir: config.VIDEO_STORAGE_PATH,
      delayMs: config.MOCK_DELAY_MS,
      sleep: overrides.clock?.sleep
    });
  }

  const client = config.GENERATION_API_KEY
    ? new HttpTransferClient({
        baseUrl: config.GENERATION_API_URL,
        apiKey: config.GENERATION_API_KEY,
        requestTimeoutMs: config.REQUEST_TIMEOUT_SECONDS * 1000,
        downloadTimeoutMs: config.DOWNLOAD_TIMEOUT_SECONDS * 1000,
        fetchImpl: overrides.fetchImpl
      })
    : null;

  return new RemoteBackend({
    client,
    videoDir: config.VIDEO_STORAGE_PATH,
    generation: {
      duration: config.VIDEO_DURATION_SECONDS,
      resolution: config.VIDEO_RESOLUTION
    },
    pollIntervalMs: config.POLL_INTERVAL_SECONDS * 1000,
    maxWaitMs: config.GENERATION_TIMEOUT_SECONDS * 1000,
    maxConsecutivePollErrors: config.POLL_MAX_CONSECUTIVE_ERRORS,
    clock: overrides.clock
  });
}
