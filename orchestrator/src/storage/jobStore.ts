import { logger } from '../logger.js';
import type { NewVideoJob, VideoJob, VideoJobStatus, VideoSessionSnapshot } from '../types.js';

export interface JobStatusDetails {
  videoPath?: string;
  error?: string;
}

export interface JobStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  createJob(job: NewVideoJob): Promise<VideoJob>;
  /** Resolves false when the job is unknown or the move would go backwards. */
  updateJobStatus(jobId: string, status: VideoJobStatus, details?: JobStatusDetails): Promise<boolean>;
  getJob(jobId: string): Promise<VideoJob | null>;
  listJobsForUser(userId: string, limit: number): Promise<VideoJob[]>;
  saveSession(userId: string, snapshot: VideoSessionSnapshot): Promise<void>;
  getSession(userId: string): Promise<VideoSessionSnapshot | null>;
  clearSession(userId: string): Promise<void>;
}

const PREDECESSORS: Record<VideoJobStatus, readonly VideoJobStatus[]> = {
  pending: [],
  processing: ['pending'],
  completed: ['processing'],
  failed: ['pending', 'processing']
};

export function allowedPredecessors(status: VideoJobStatus): VideoJobStatus[] {
  return [...PREDECESSORS[status]];
}

export function canTransition(from: VideoJobStatus, to: VideoJobStatus): boolean {
  return PREDECESSORS[to].includes(from);
}

export function laterTimestamp(previous: string, now: string): string {
  return now > previous ? now : previous;
}

export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, VideoJob>();
  private readonly sessions = new Map<string, VideoSessionSnapshot>();

  async connect(): Promise<void> {
    logger.info('Using in-memory job store');
  }

  async disconnect(): Promise<void> {}

  async createJob(job: NewVideoJob): Promise<VideoJob> {
    if (this.jobs.has(job.jobId)) {
      throw new Error(`Job ${job.jobId} already exists`);
    }
    const now = new Date().toISOString();
    const record: VideoJob = {
      jobId: job.jobId,
      userId: job.userId,
      prompt: job.prompt,
      photos: [...job.photos],
      status: 'pending',
      createdAt: now,
      updatedAt: now
    };
    this.jobs.set(job.jobId, record);
    return { ...record, photos: [...record.photos] };
  }

  async updateJobStatus(jobId: string, status: VideoJobStatus, details: JobStatusDetails = {}): Promise<boolean> {
    const current = this.jobs.get(jobId);
    if (!current) {
      logger.warn({ jobId, status }, 'Status update for unknown job');
      return false;
    }
    if (!canTransition(current.status, status)) {
      logger.warn({ jobId, from: current.status, to: status }, 'Ignoring backwards job transition');
      return false;
    }

    const updated: VideoJob = {
      ...current,
      status,
      updatedAt: laterTimestamp(current.updatedAt, new Date().toISOString())
    };
    if (status === 'completed' && details.videoPath) {
      updated.videoPath = details.videoPath;
    }
    if (status === 'failed' && details.error) {
      updated.errorMessage = details.error;
    }
    this.jobs.set(jobId, updated);
    return true;
  }

  async getJob(jobId: string): Promise<VideoJob | null> {
    const job = this.jobs.get(jobId);
    return job ? { ...job, photos: [...job.photos] } : null;
  }

  async listJobsForUser(userId: string, limit: number): Promise<VideoJob[]> {
    // Insertion order breaks ties between jobs created within the same millisecond
    return Array.from(this.jobs.values())
      .map((job, index) => ({ job, index }))
      .filter(({ job }) => job.userId === userId)
      .sort((a, b) => b.job.createdAt.localeCompare(a.job.createdAt) || b.index - a.index)
      .slice(0, limit)
      .map(({ job }) => ({ ...job, photos: [...job.photos] }));
  }

  async saveSession(userId: string, snapshot: VideoSessionSnapshot): Promise<void> {
    this.sessions.set(userId, { ...snapshot, photos: [...snapshot.photos] });
  }

  async getSession(userId: string): Promise<VideoSessionSnapshot | null> {
    const snapshot = this.sessions.get(userId);
    return snapshot ? { ...snapshot, photos: [...snapshot.photos] } : null;
  }

  async clearSession(userId: string): Promise<void> {
    this.sessions.delete(userId);
  }
}
