import { logger } from './logger.js';
import { GenerationOrchestrator, createJobId } from './generationOrchestrator.js';
import { SessionRegistry } from './session/sessionRegistry.js';
import { VideoSession } from './session/videoSession.js';
import type { GenerationBackend, GenerationMode } from './backends/types.js';
import type { JobStore } from './storage/jobStore.js';
import type { FailureNotifier } from './telegram.js';
import type { JobResult, JobTransition, NewVideoJob, VideoJob } from './types.js';

export const DEFAULT_JOB_LIST_LIMIT = 10;

export interface VideoGenerationServiceOptions {
  store: JobStore;
  backend: GenerationBackend;
  registry?: SessionRegistry;
  notifier?: FailureNotifier;
}

/**
 * Per-user surface for the chat layer. Every call for one user runs through
 * the registry queue; the generation itself runs outside it so the user can
 * still cancel or query while a job is in flight.
 */
export class VideoGenerationService {
  private readonly store: JobStore;
  private readonly registry: SessionRegistry;
  private readonly notifier?: FailureNotifier;
  private readonly orchestrator: GenerationOrchestrator;

  constructor(options: VideoGenerationServiceOptions) {
    this.store = options.store;
    this.registry = options.registry ?? new SessionRegistry();
    this.notifier = options.notifier;
    this.orchestrator = new GenerationOrchestrator({
      backend: options.backend,
      onTransition: (transition) => this.recordTransition(transition)
    });
  }

  get mode(): GenerationMode {
    return this.orchestrator.mode;
  }

  async startCollectingPhoto(userId: string, ref: string): Promise<boolean> {
    return this.registry.runExclusive(userId, async () => {
      const session = await this.loadSession(userId);
      const added = session.addPhoto(ref);
      if (added) {
        await this.store.saveSession(userId, session.snapshot());
      }
      return added;
    });
  }

  async setPrompt(userId: string, text: string): Promise<void> {
    await this.registry.runExclusive(userId, async () => {
      const session = await this.loadSession(userId);
      session.setPrompt(text);
      await this.store.saveSession(userId, session.snapshot());
    });
  }

  async isReady(userId: string): Promise<boolean> {
    return this.registry.runExclusive(userId, async () => {
      const session = await this.loadSession(userId);
      return session.isReady();
    });
  }

  async submit(userId: string): Promise<JobResult> {
    const { job, session } = await this.registry.runExclusive(userId, () => this.createPendingJob(userId));

    const result = await this.orchestrator.generate(userId, job.prompt, job.photos, job.jobId);

    await this.registry.runExclusive(userId, async () => {
      // After cancel() the registry holds a fresh session that must survive this job
      if (this.registry.get(userId) === session) {
        await this.discardSession(userId, session);
      }
    });

    if (result.status === 'failed' && this.notifier) {
      try {
        await this.notifier.notifyJobFailed({
          jobId: result.jobId,
          userId,
          error: result.error,
          errorKind: result.errorKind
        });
      } catch (error) {
        logger.error({ userId, jobId: result.jobId, error }, 'Failed to send failure notification');
      }
    }

    return result;
  }

  async cancel(userId: string): Promise<void> {
    await this.registry.runExclusive(userId, async () => {
      const session = await this.loadSession(userId);
      if (session.state === 'processing') {
        logger.info({ userId }, 'Session cancelled while a job is running; the job continues in the background');
      }
      this.registry.set(userId, new VideoSession());
      await this.store.clearSession(userId);
    });
  }

  async getJob(jobId: string): Promise<VideoJob | null> {
    return this.store.getJob(jobId);
  }

  async listJobs(userId: string, limit: number = DEFAULT_JOB_LIST_LIMIT): Promise<VideoJob[]> {
    return this.store.listJobsForUser(userId, limit);
  }

  private async createPendingJob(userId: string): Promise<{ job: NewVideoJob; session: VideoSession }> {
    const session = await this.loadSession(userId);
    const input = session.startProcessing();
    const job: NewVideoJob = {
      jobId: createJobId(),
      userId,
      prompt: input.prompt,
      photos: input.photos
    };

    try {
      await this.store.saveSession(userId, session.snapshot());
      await this.store.createJob(job);
    } catch (error) {
      logger.error({ userId, jobId: job.jobId, error }, 'Failed to create job record');
      await this.discardSession(userId, session);
      throw error;
    }

    logger.info({ userId, jobId: job.jobId, photos: job.photos.length }, 'Job created');
    return { job, session };
  }

  private async loadSession(userId: string): Promise<VideoSession> {
    const live = this.registry.get(userId);
    if (live) {
      return live;
    }

    const snapshot = await this.store.getSession(userId);
    if (!snapshot) {
      return this.registry.getOrCreate(userId);
    }

    const session = VideoSession.restore(snapshot);
    if (session.state === 'processing') {
      // Nothing in this process owns that job any more
      logger.warn({ userId }, 'Discarding stale processing session');
      session.reset();
      await this.store.clearSession(userId);
    }
    this.registry.set(userId, session);
    return session;
  }

  // The in-memory session is reset even when the persisted copy cannot be removed
  private async discardSession(userId: string, session: VideoSession): Promise<void> {
    session.reset();
    try {
      await this.store.clearSession(userId);
    } catch (error) {
      logger.error({ userId, error }, 'Failed to clear persisted session');
    }
  }

  private async recordTransition(transition: JobTransition): Promise<void> {
    await this.store.updateJobStatus(transition.jobId, transition.status, {
      videoPath: transition.videoPath,
      error: transition.error
    });
  }
}
