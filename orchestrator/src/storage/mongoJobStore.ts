import { MongoClient, type Collection, type Db } from 'mongodb';
import { logger } from '../logger.js';
import type { NewVideoJob, VideoJob, VideoJobStatus, VideoSessionSnapshot, VideoSessionState } from '../types.js';
import { allowedPredecessors, type JobStatusDetails, type JobStore } from './jobStore.js';

interface VideoSessionRecord {
  userId: string;
  state: VideoSessionState;
  photos: string[];
  prompt: string | null;
  updatedAt: string;
}

interface MongoJobStoreOptions {
  mongoUri: string;
  databaseName: string;
}

export class MongoJobStore implements JobStore {
  private client: MongoClient;
  private db: Db;
  private jobsCollection: Collection<VideoJob>;
  private sessionsCollection: Collection<VideoSessionRecord>;

  constructor(options: MongoJobStoreOptions) {
    this.client = new MongoClient(options.mongoUri);
    this.db = this.client.db(options.databaseName);
    this.jobsCollection = this.db.collection<VideoJob>('video_jobs');
    this.sessionsCollection = this.db.collection<VideoSessionRecord>('video_sessions');
  }

  async connect(): Promise<void> {
    await this.client.connect();
    await this.ensureIndexes();
    logger.info('JobStore connected to MongoDB');
  }

  async disconnect(): Promise<void> {
    await this.client.close();
  }

  private async ensureIndexes(): Promise<void> {
    await this.jobsCollection.createIndex({ jobId: 1 }, { unique: true });
    await this.jobsCollection.createIndex({ userId: 1, createdAt: -1 });
    await this.jobsCollection.createIndex({ status: 1, updatedAt: 1 });
    await this.sessionsCollection.createIndex({ userId: 1 }, { unique: true });
  }

  async createJob(job: NewVideoJob): Promise<VideoJob> {
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

    // Spread so the driver's _id does not leak into the returned record
    await this.jobsCollection.insertOne({ ...record });
    logger.info({ jobId: job.jobId, userId: job.userId, status: 'pending' }, 'Job saved to database');
    return record;
  }

  async updateJobStatus(jobId: string, status: VideoJobStatus, details: JobStatusDetails = {}): Promise<boolean> {
    const updateData: Partial<VideoJob> = { status };
    if (status === 'completed' && details.videoPath) {
      updateData.videoPath = details.videoPath;
    }
    if (status === 'failed' && details.error) {
      updateData.errorMessage = details.error;
    }

    // The status filter makes the transition check and the write a single atomic step
    const result = await this.jobsCollection.updateOne(
      { jobId, status: { $in: allowedPredecessors(status) } },
      {
        $set: updateData,
        $max: { updatedAt: new Date().toISOString() }
      }
    );

    if (result.matchedCount === 0) {
      logger.warn({ jobId, status }, 'Job status not updated (unknown job or backwards transition)');
      return false;
    }

    logger.info({ jobId, status }, 'Job status updated');
    return true;
  }

  async getJob(jobId: string): Promise<VideoJob | null> {
    return await this.jobsCollection.findOne({ jobId }, { projection: { _id: 0 } });
  }

  async listJobsForUser(userId: string, limit: number): Promise<VideoJob[]> {
    return await this.jobsCollection
      .find({ userId }, { projection: { _id: 0 } })
      .sort({ createdAt: -1 })
      .limit(limit)
      .toArray();
  }

  async saveSession(userId: string, snapshot: VideoSessionSnapshot): Promise<void> {
    await this.sessionsCollection.replaceOne(
      { userId },
      {
        userId,
        state: snapshot.state,
        photos: [...snapshot.photos],
        prompt: snapshot.prompt,
        updatedAt: new Date().toISOString()
      },
      { upsert: true }
    );
  }

  async getSession(userId: string): Promise<VideoSessionSnapshot | null> {
    const record = await this.sessionsCollection.findOne({ userId });
    if (!record) {
      return null;
    }
    return { state: record.state, photos: record.photos, prompt: record.prompt };
  }

  async clearSession(userId: string): Promise<void> {
    await this.sessionsCollection.deleteOne({ userId });
  }
}
