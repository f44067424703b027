import { basename } from 'node:path';
import { logger } from '../logger.js';
import {
  ConfigurationError,
  GenerationError,
  RemoteJobError,
  TimeoutError,
  TransferError,
  UploadError,
  errorMessage
} from '../errors.js';
import { JobPoller, type Clock } from '../jobPoller.js';
import { writeArtifact } from '../storage/artifacts.js';
import type { TransferClient } from '../transferClient.js';
import type { GenerationOptions } from '../types.js';
import type { GenerationBackend, GenerationHooks, GenerationOutcome, GenerationRequest } from './types.js';

export interface RemoteBackendOptions {
  /** null when no API key is configured; every request then fails before touching the network. */
  client: TransferClient | null;
  videoDir: string;
  generation: GenerationOptions;
  pollIntervalMs: number;
  maxWaitMs: number;
  maxConsecutivePollErrors?: number;
  clock?: Clock;
}

function pollFailure(reason: 'remote' | 'timeout' | 'transfer', message: string): GenerationError {
  if (reason === 'timeout') {
    return new TimeoutError(message);
  }
  if (reason === 'remote') {
    return new RemoteJobError(message);
  }
  return new TransferError(message);
}

export class RemoteBackend implements GenerationBackend {
  readonly mode = 'real' as const;
  private readonly poller: JobPoller | null;

  constructor(private readonly options: RemoteBackendOptions) {
    this.poller = options.client
      ? new JobPoller(options.client, {
          clock: options.clock,
          maxConsecutiveErrors: options.maxConsecutivePollErrors,
          onPoll: (state, attempt) => {
            logger.debug({ status: state.status, attempt }, 'Polled remote job');
          }
        })
      : null;
  }

  async generate(request: GenerationRequest, hooks: GenerationHooks): Promise<GenerationOutcome> {
    const { client } = this.options;
    if (!client || !this.poller) {
      throw new ConfigurationError('Generation API key not configured');
    }

    const fileIds = await this.uploadPhotos(client, request);
    if (fileIds.length === 0) {
      throw new UploadError(request.photos.length);
    }

    const remoteJobId = await client.submitJob({
      prompt: request.prompt,
      referenceImages: fileIds,
      options: this.options.generation
    });
    logger.info({ jobId: request.jobId, remoteJobId, references: fileIds.length }, 'Remote job accepted');
    await hooks.onProcessing(remoteJobId);

    const result = await this.poller.pollUntilDone(remoteJobId, this.options.pollIntervalMs, this.options.maxWaitMs);
    if (result.status === 'failed') {
      throw pollFailure(result.reason, result.error);
    }

    if (!result.videoUrl) {
      throw new TransferError(`Remote job ${remoteJobId} completed without a video URL`);
    }

    const bytes = await client.downloadArtifact(result.videoUrl);
    const videoPath = await writeArtifact(this.options.videoDir, request.jobId, bytes);
    logger.info({ jobId: request.jobId, remoteJobId, videoPath, bytes: bytes.byteLength }, 'Video downloaded');

    return { videoPath, remoteJobId };
  }

  private async uploadPhotos(client: TransferClient, request: GenerationRequest): Promise<string[]> {
    const fileIds: string[] = [];
    for (const photo of request.photos) {
      try {
        fileIds.push(await client.uploadAsset(photo));
      } catch (error) {
        logger.warn({ jobId: request.jobId, photo: basename(photo), error: errorMessage(error) }, 'Photo upload failed, skipping');
      }
    }
    return fileIds;
  }
}
