export type GenerationMode = 'mock' | 'real';

export interface GenerationRequest {
  jobId: string;
  userId: string;
  prompt: string;
  photos: readonly string[];
}

export interface GenerationHooks {
  /** Called once, when the job is actually being worked on (remote job accepted, or simulation started). */
  onProcessing(remoteJobId?: string): Promise<void>;
}

export interface GenerationOutcome {
  videoPath: string;
  remoteJobId?: string;
}

/**
 * One way of turning a request into a video file. Implementations throw
 * GenerationError subclasses; normalizing them is the orchestrator's job.
 */
export interface GenerationBackend {
  readonly mode: GenerationMode;
  generate(request: GenerationRequest, hooks: GenerationHooks): Promise<GenerationOutcome>;
}
