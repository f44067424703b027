import { randomUUID } from 'node:crypto';
import { logger } from './logger.js';
import { InvalidJobIdError, describeFailure } from './errors.js';
import { isValidJobId } from './storage/artifacts.js';
import { expandPromptTemplate } from './templates.js';
import type { GenerationBackend, GenerationMode } from './backends/types.js';
import type { FailedJobResult, JobResult, JobTransition } from './types.js';

export type TransitionListener = (transition: JobTransition) => Promise<void> | void;

export interface GenerationOrchestratorOptions {
  backend: GenerationBackend;
  onTransition?: TransitionListener;
}

export function createJobId(): string {
  return `vid_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

/**
 * Entry point for a single generation attempt. Whatever the backend does,
 * generate() resolves with a JobResult; it never rejects.
 */
export class GenerationOrchestrator {
  private readonly backend: GenerationBackend;
  private readonly onTransition?: TransitionListener;

  constructor(options: GenerationOrchestratorOptions) {
    this.backend = options.backend;
    this.onTransition = options.onTransition;
  }

  get mode(): GenerationMode {
    return this.backend.mode;
  }

  async generate(
    userId: string,
    prompt: string,
    photos: readonly string[],
    jobId: string = createJobId()
  ): Promise<JobResult> {
    const startedAt = Date.now();
    const progress: { remoteJobId?: string } = {};
    logger.info({ jobId, userId, mode: this.backend.mode, photos: photos.length }, 'Starting video generation');

    let videoPath: string;
    try {
      if (!isValidJobId(jobId)) {
        throw new InvalidJobIdError(jobId);
      }
      const outcome = await this.backend.generate(
        { jobId, userId, prompt: expandPromptTemplate(prompt), photos: [...photos] },
        {
          onProcessing: async (remoteJobId) => {
            progress.remoteJobId = remoteJobId;
            await this.emit({ jobId, status: 'processing', remoteJobId });
          }
        }
      );
      videoPath = outcome.videoPath;
      progress.remoteJobId = outcome.remoteJobId ?? progress.remoteJobId;
    } catch (error) {
      const failure = describeFailure(error);
      logger.error(
        { jobId, userId, kind: failure.kind, error: failure.message, durationMs: Date.now() - startedAt },
        'Video generation failed'
      );
      const result: FailedJobResult = {
        jobId,
        status: 'failed',
        error: failure.message,
        errorKind: failure.kind,
        remoteJobId: progress.remoteJobId
      };
      await this.emit({
        jobId,
        status: 'failed',
        remoteJobId: progress.remoteJobId,
        error: failure.message,
        errorKind: failure.kind
      });
      return result;
    }

    logger.info({ jobId, userId, videoPath, durationMs: Date.now() - startedAt }, 'Video generation completed');
    await this.emit({ jobId, status: 'completed', remoteJobId: progress.remoteJobId, videoPath });
    return { jobId, status: 'completed', videoPath, remoteJobId: progress.remoteJobId };
  }

  private async emit(transition: JobTransition): Promise<void> {
    if (!this.onTransition) {
      return;
    }
    try {
      await this.onTransition(transition);
    } catch (error) {
      logger.error({ jobId: transition.jobId, status: transition.status, error }, 'Failed to record job transition');
    }
  }
}
