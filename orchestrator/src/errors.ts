import type { GenerationErrorKind, VideoSessionState } from './types.js';

export class GenerationError extends Error {
  readonly kind: GenerationErrorKind;

  constructor(kind: GenerationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class ConfigurationError extends GenerationError {
  constructor(message: string) {
    super('configuration', message);
  }
}

export class InvalidJobIdError extends GenerationError {
  constructor(jobId: string) {
    super('configuration', `Invalid job id: ${jobId}`);
  }
}

export class UploadError extends GenerationError {
  readonly attempted: number;

  constructor(attempted: number) {
    super('upload', 'Failed to upload photos');
    this.attempted = attempted;
  }
}

export class SubmissionError extends GenerationError {
  readonly statusCode: number;
  readonly payload: string;

  constructor(statusCode: number, payload: string) {
    // The raw payload is what the user sees; fall back to the status when the body is empty
    super('submission', payload.trim() ? payload : `Generation request rejected (${statusCode})`);
    this.statusCode = statusCode;
    this.payload = payload;
  }
}

export class TimeoutError extends GenerationError {
  constructor(message = 'Timeout waiting for video generation') {
    super('timeout', message);
  }
}

export class TransferError extends GenerationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transfer', message, options);
  }
}

export class RemoteJobError extends GenerationError {
  constructor(message: string) {
    super('remote', message);
  }
}

export class SessionError extends GenerationError {
  constructor(message: string) {
    super('session', message);
  }
}

export class InvalidStateTransitionError extends SessionError {
  readonly state: VideoSessionState;
  readonly action: string;

  constructor(state: VideoSessionState, action: string) {
    super(`Cannot ${action} while session is ${state}`);
    this.state = state;
    this.action = action;
  }
}

export class InvalidPromptError extends SessionError {
  constructor() {
    super('Prompt must not be empty');
  }
}

export function isGenerationError(error: unknown): error is GenerationError {
  return error instanceof GenerationError;
}

export function describeFailure(error: unknown): { message: string; kind: GenerationErrorKind } {
  if (isGenerationError(error)) {
    return { message: error.message, kind: error.kind };
  }
  if (error instanceof Error) {
    return { message: error.message, kind: 'transfer' };
  }
  return { message: String(error), kind: 'transfer' };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
