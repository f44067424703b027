import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { InvalidJobIdError } from '../errors.js';

const JOB_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export function isValidJobId(jobId: string): boolean {
  return JOB_ID_PATTERN.test(jobId);
}

// Job ids become file names, so anything that could leave videoDir is refused
export function artifactPath(videoDir: string, jobId: string): string {
  if (!isValidJobId(jobId)) {
    throw new InvalidJobIdError(jobId);
  }
  return join(resolve(videoDir), `${jobId}.mp4`);
}

export async function writeArtifact(videoDir: string, jobId: string, bytes: Uint8Array | string): Promise<string> {
  const path = artifactPath(videoDir, jobId);
  await mkdir(resolve(videoDir), { recursive: true });
  await writeFile(path, bytes);
  return path;
}
