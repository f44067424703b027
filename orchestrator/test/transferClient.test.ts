import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SubmissionError, TransferError } from '../src/errors.js';
import { HttpTransferClient } from '../src/transferClient.js';
import { createTempDir, writePhoto, type TempDir } from './helpers.js';

interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: RequestInit['body'];
}

function headersOf(init: RequestInit | undefined): Record<string, string> {
  const headers = new Headers(init?.headers);
  return Object.fromEntries(headers.entries());
}

function createFetch(responder: (request: RecordedRequest) => Response | Promise<Response>) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const request: RecordedRequest = {
      url: input instanceof Request ? input.url : input.toString(),
      method: init?.method ?? 'GET',
      headers: headersOf(init),
      body: init?.body
    };
    requests.push(request);
    return responder(request);
  };
  return { fetchImpl, requests };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

function createClient(fetchImpl: typeof fetch): HttpTransferClient {
  return new HttpTransferClient({
    baseUrl: 'https://api.test/v1',
    apiKey: 'test-secret',
    requestTimeoutMs: 1000,
    downloadTimeoutMs: 2000,
    fetchImpl
  });
}

describe('HttpTransferClient', () => {
  let temp: TempDir;

  beforeEach(async () => {
    temp = await createTempDir();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('uploads a photo as multipart form data with the bearer token', async () => {
    const photo = await writePhoto(temp.path, 'p1.jpg');
    const { fetchImpl, requests } = createFetch(() => json({ file_id: 'file-abc' }));

    const fileId = await createClient(fetchImpl).uploadAsset(photo);

    expect(fileId).toBe('file-abc');
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://api.test/v1/upload');
    expect(requests[0].method).toBe('POST');
    expect(requests[0].headers.authorization).toBe('Bearer test-secret');
    const body = requests[0].body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      const file = body.get('file');
      expect(file).toBeInstanceOf(Blob);
      if (file instanceof Blob) {
        expect(await file.text()).toBe('fake-image-bytes');
      }
    }
  });

  it('accepts numeric remote ids', async () => {
    const photo = await writePhoto(temp.path, 'p1.jpg');
    const { fetchImpl } = createFetch(() => json({ file_id: 42 }));

    await expect(createClient(fetchImpl).uploadAsset(photo)).resolves.toBe('42');
  });

  it('raises a transfer error when an upload is rejected', async () => {
    const photo = await writePhoto(temp.path, 'p1.jpg');
    const { fetchImpl } = createFetch(() => new Response('too large', { status: 413 }));

    const upload = createClient(fetchImpl).uploadAsset(photo);

    await expect(upload).rejects.toBeInstanceOf(TransferError);
    await expect(upload).rejects.toThrow('Upload of p1.jpg failed (413): too large');
  });

  it('submits the prompt, references and options as JSON', async () => {
    const { fetchImpl, requests } = createFetch(() => json({ job_id: 'job-remote-1' }));

    const remoteJobId = await createClient(fetchImpl).submitJob({
      prompt: 'dance video',
      referenceImages: ['file-1', 'file-2'],
      options: { duration: 5, resolution: '1080p' }
    });

    expect(remoteJobId).toBe('job-remote-1');
    expect(requests[0].url).toBe('https://api.test/v1/generate');
    expect(requests[0].headers['content-type']).toBe('application/json');
    expect(typeof requests[0].body === 'string' ? JSON.parse(requests[0].body) : null).toEqual({
      prompt: 'dance video',
      reference_images: ['file-1', 'file-2'],
      options: { duration: 5, resolution: '1080p' }
    });
  });

  it('carries the raw payload of a rejected submission', async () => {
    const { fetchImpl } = createFetch(() => new Response('{"detail":"quota exceeded"}', { status: 429 }));

    const error = await createClient(fetchImpl)
      .submitJob({ prompt: 'p', referenceImages: ['f'], options: { duration: 5, resolution: '1080p' } })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SubmissionError);
    if (error instanceof SubmissionError) {
      expect(error.statusCode).toBe(429);
      expect(error.payload).toBe('{"detail":"quota exceeded"}');
      expect(error.message).toBe('{"detail":"quota exceeded"}');
      expect(error.kind).toBe('submission');
    }
  });

  it('maps remote job statuses', async () => {
    const bodies: Record<string, unknown> = {
      'https://api.test/v1/jobs/a': { status: 'pending' },
      'https://api.test/v1/jobs/b': { status: 'COMPLETED', video_url: 'https://cdn.test/b.mp4' },
      'https://api.test/v1/jobs/c': { status: 'failed', error: 'nsfw' },
      'https://api.test/v1/jobs/d': { status: 'queued', video_url: null }
    };
    const { fetchImpl } = createFetch((request) => json(bodies[request.url]));
    const client = createClient(fetchImpl);

    expect(await client.getJobStatus('a')).toEqual({ status: 'pending' });
    expect(await client.getJobStatus('b')).toEqual({ status: 'completed', videoUrl: 'https://cdn.test/b.mp4' });
    expect(await client.getJobStatus('c')).toEqual({ status: 'failed', error: 'nsfw' });
    expect(await client.getJobStatus('d')).toEqual({ status: 'pending' });
  });

  it('escapes the remote job id in the status URL', async () => {
    const { fetchImpl, requests } = createFetch(() => json({ status: 'pending' }));

    await createClient(fetchImpl).getJobStatus('a/b c');

    expect(requests[0].url).toBe('https://api.test/v1/jobs/a%2Fb%20c');
  });

  it('raises a transfer error for a malformed status body', async () => {
    const { fetchImpl } = createFetch(() => new Response('<html>oops</html>', { status: 200 }));

    await expect(createClient(fetchImpl).getJobStatus('a')).rejects.toBeInstanceOf(TransferError);
  });

  it('downloads the artifact without the API token', async () => {
    const { fetchImpl, requests } = createFetch(() => new Response(new Uint8Array([7, 8, 9]), { status: 200 }));

    const bytes = await createClient(fetchImpl).downloadArtifact('https://cdn.test/video.mp4');

    expect(Array.from(bytes)).toEqual([7, 8, 9]);
    expect(requests[0].url).toBe('https://cdn.test/video.mp4');
    expect(requests[0].headers.authorization).toBeUndefined();
  });

  it('raises a transfer error when the download fails', async () => {
    const { fetchImpl } = createFetch(() => new Response('gone', { status: 404 }));

    await expect(createClient(fetchImpl).downloadArtifact('https://cdn.test/video.mp4')).rejects.toThrow(
      'Video download failed (404): gone'
    );
  });

  it('wraps transport faults and timeouts', async () => {
    const refused = createFetch(() => {
      throw new TypeError('fetch failed');
    });
    await expect(createClient(refused.fetchImpl).getJobStatus('a')).rejects.toThrow(
      'Request to https://api.test/v1/jobs/a failed: fetch failed'
    );

    const slow = createFetch(() => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    });
    await expect(createClient(slow.fetchImpl).getJobStatus('a')).rejects.toThrow(
      'Request to https://api.test/v1/jobs/a timed out after 1000ms'
    );
  });

  it('shortens the status request timeout to the one it is given', async () => {
    const slow = createFetch(() => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    });
    const client = createClient(slow.fetchImpl);

    await expect(client.getJobStatus('a', 250)).rejects.toThrow('Request to https://api.test/v1/jobs/a timed out after 250ms');
    await expect(client.getJobStatus('a', 5000)).rejects.toThrow('Request to https://api.test/v1/jobs/a timed out after 1000ms');
  });

  it('aborts a hanging status request once its timeout passes', async () => {
    const hanging: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        signal?.addEventListener('abort', () => reject(signal.reason));
      });

    await expect(createClient(hanging).getJobStatus('a', 20)).rejects.toThrow(
      'Request to https://api.test/v1/jobs/a timed out after 20ms'
    );
  });
});
