import { logger } from '../logger.js';
import { systemClock } from '../jobPoller.js';
import { writeArtifact } from '../storage/artifacts.js';
import type { GenerationBackend, GenerationHooks, GenerationOutcome, GenerationRequest } from './types.js';

export interface MockBackendOptions {
  videoDir: string;
  delayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

// Simulated generation: waits, then leaves an empty placeholder where the video would be
export class MockBackend implements GenerationBackend {
  readonly mode = 'mock' as const;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: MockBackendOptions) {
    this.sleep = options.sleep ?? systemClock.sleep;
  }

  async generate(request: GenerationRequest, hooks: GenerationHooks): Promise<GenerationOutcome> {
    logger.info({ jobId: request.jobId, delayMs: this.options.delayMs }, 'Mock mode: simulating video generation');
    await hooks.onProcessing();
    await this.sleep(this.options.delayMs);

    const videoPath = await writeArtifact(this.options.videoDir, request.jobId, '');
    return { videoPath };
  }
}
