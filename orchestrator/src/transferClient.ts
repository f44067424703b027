import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import { logger } from './logger.js';
import { SubmissionError, TransferError, errorMessage } from './errors.js';
import type { RemoteJobState, SubmitJobRequest } from './types.js';

export interface TransferClient {
  uploadAsset(photoPath: string): Promise<string>;
  submitJob(request: SubmitJobRequest): Promise<string>;
  /** `timeoutMs` can only shorten the client's own request timeout. */
  getJobStatus(remoteJobId: string, timeoutMs?: number): Promise<RemoteJobState>;
  downloadArtifact(url: string): Promise<Uint8Array>;
}

export interface HttpTransferClientOptions {
  baseUrl: string;
  apiKey: string;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  fetchImpl?: typeof fetch;
}

const remoteId = z.union([z.string().min(1), z.number()]).transform(String);

const uploadResponseSchema = z.object({ file_id: remoteId });
const submitResponseSchema = z.object({ job_id: remoteId });
const statusResponseSchema = z.object({
  status: z.string().optional(),
  video_url: z.string().min(1).nullish(),
  error: z.string().nullish()
});

function ensureTrailingSlash(value: string): string {
  return value.endsWith('/') ? value : `${value}/`;
}

function describeResponse(response: Response, body: string): string {
  const detail = body.trim() || response.statusText;
  return `(${response.status})${detail ? `: ${detail}` : ''}`;
}

export class HttpTransferClient implements TransferClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly requestTimeoutMs: number;
  private readonly downloadTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpTransferClientOptions) {
    this.baseUrl = ensureTrailingSlash(options.baseUrl);
    this.apiKey = options.apiKey;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.downloadTimeoutMs = options.downloadTimeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async uploadAsset(photoPath: string): Promise<string> {
    const bytes = await readFile(photoPath);
    const form = new FormData();
    form.append('file', new Blob([bytes]), basename(photoPath));

    const response = await this.send(this.buildUrl('upload'), {
      method: 'POST',
      headers: this.buildHeaders(),
      body: form
    }, this.requestTimeoutMs);

    if (!response.ok) {
      const body = await this.readText(response);
      throw new TransferError(`Upload of ${basename(photoPath)} failed ${describeResponse(response, body)}`);
    }

    const { file_id: fileId } = await this.parseJson(response, uploadResponseSchema);
    logger.debug({ photoPath, fileId }, 'Uploaded reference photo');
    return fileId;
  }

  async submitJob(request: SubmitJobRequest): Promise<string> {
    const response = await this.send(this.buildUrl('generate'), {
      method: 'POST',
      headers: this.buildHeaders({ 'Content-Type': 'application/json' }),
      body: JSON.stringify({
        prompt: request.prompt,
        reference_images: request.referenceImages,
        options: {
          duration: request.options.duration,
          resolution: request.options.resolution
        }
      })
    }, this.requestTimeoutMs);

    if (!response.ok) {
      throw new SubmissionError(response.status, await this.readText(response));
    }

    const { job_id: remoteJobId } = await this.parseJson(response, submitResponseSchema);
    logger.info({ remoteJobId }, 'Generation job submitted');
    return remoteJobId;
  }

  async getJobStatus(remoteJobId: string, timeoutMs?: number): Promise<RemoteJobState> {
    const response = await this.send(this.buildUrl(`jobs/${encodeURIComponent(remoteJobId)}`), {
      method: 'GET',
      headers: this.buildHeaders()
    }, Math.min(this.requestTimeoutMs, timeoutMs ?? this.requestTimeoutMs));

    if (!response.ok) {
      const body = await this.readText(response);
      throw new TransferError(`Status check for ${remoteJobId} failed ${describeResponse(response, body)}`);
    }

    const payload = await this.parseJson(response, statusResponseSchema);
    const status = payload.status?.toLowerCase();
    if (status === 'completed') {
      return { status: 'completed', videoUrl: payload.video_url ?? undefined };
    }
    if (status === 'failed') {
      return { status: 'failed', error: payload.error ?? undefined };
    }
    return { status: 'pending' };
  }

  async downloadArtifact(url: string): Promise<Uint8Array> {
    // The artifact URL is usually a CDN link; the API token is not sent there
    const response = await this.send(url, { method: 'GET' }, this.downloadTimeoutMs);

    if (!response.ok) {
      const body = await this.readText(response);
      throw new TransferError(`Video download failed ${describeResponse(response, body)}`);
    }

    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw new TransferError(`Video download interrupted: ${errorMessage(error)}`, { cause: error });
    }
  }

  private buildUrl(path: string): string {
    return new URL(path, this.baseUrl).toString();
  }

  private buildHeaders(extra?: Record<string, string>): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      ...extra
    };
  }

  private async send(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
    try {
      return await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new TransferError(`Request to ${url} timed out after ${timeoutMs}ms`, { cause: error });
      }
      throw new TransferError(`Request to ${url} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async readText(response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (_error) {
      return response.statusText;
    }
  }

  private async parseJson<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new TransferError(`Failed to parse response JSON: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join(', ');
      throw new TransferError(`Unexpected response from ${response.url || 'generation service'}: ${issues}`);
    }
    return parsed.data;
  }
}
