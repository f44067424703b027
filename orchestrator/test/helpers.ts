import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Clock } from '../src/jobPoller.js';
import type { TransferClient } from '../src/transferClient.js';
import type { RemoteJobState, SubmitJobRequest } from '../src/types.js';

export class FakeClock implements Clock {
  current = 0;
  sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

type StatusStep = RemoteJobState | Error;

export class FakeTransferClient implements TransferClient {
  uploads: string[] = [];
  submissions: SubmitJobRequest[] = [];
  statusQueries = 0;
  statusTimeouts: Array<number | undefined> = [];
  downloads: string[] = [];

  failingUploads = new Set<string>();
  submitError?: Error;
  downloadError?: Error;
  remoteJobId = 'remote-1';
  artifact = new Uint8Array([1, 2, 3]);
  private readonly statusSteps: StatusStep[];

  constructor(statusSteps: StatusStep[] = [{ status: 'completed', videoUrl: 'https://cdn.test/video.mp4' }]) {
    this.statusSteps = statusSteps;
  }

  async uploadAsset(photoPath: string): Promise<string> {
    this.uploads.push(photoPath);
    if (this.failingUploads.has(photoPath)) {
      throw new Error(`upload rejected for ${photoPath}`);
    }
    return `file-${this.uploads.length}`;
  }

  async submitJob(request: SubmitJobRequest): Promise<string> {
    this.submissions.push(request);
    if (this.submitError) {
      throw this.submitError;
    }
    return this.remoteJobId;
  }

  // The last step repeats once the list is exhausted
  async getJobStatus(_remoteJobId: string, timeoutMs?: number): Promise<RemoteJobState> {
    this.statusTimeouts.push(timeoutMs);
    const step = this.statusSteps[Math.min(this.statusQueries, this.statusSteps.length - 1)];
    this.statusQueries++;
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }

  async downloadArtifact(url: string): Promise<Uint8Array> {
    this.downloads.push(url);
    if (this.downloadError) {
      throw this.downloadError;
    }
    return this.artifact;
  }
}

export interface TempDir {
  path: string;
  cleanup(): Promise<void>;
}

export async function createTempDir(prefix = 'video-orchestrator-'): Promise<TempDir> {
  const path = await mkdtemp(join(tmpdir(), prefix));
  return {
    path,
    cleanup: () => rm(path, { recursive: true, force: true })
  };
}

export async function writePhoto(dir: string, name: string, content = 'fake-image-bytes'): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, content);
  return path;
}
