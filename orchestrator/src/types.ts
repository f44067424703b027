export type VideoSessionState = 'idle' | 'collecting_photos' | 'waiting_for_prompt' | 'processing';

export interface VideoSessionSnapshot {
  state: VideoSessionState;
  photos: string[];
  prompt: string | null;
}

export type VideoJobStatus = 'pending' | 'processing' | 'completed' | 'failed';

export interface VideoJob {
  jobId: string;
  userId: string;
  prompt: string;
  photos: string[];
  status: VideoJobStatus;
  videoPath?: string;
  errorMessage?: string;
  createdAt: string;
  updatedAt: string;
}

export type NewVideoJob = Pick<VideoJob, 'jobId' | 'userId' | 'prompt' | 'photos'>;

export type GenerationErrorKind =
  | 'configuration'
  | 'upload'
  | 'submission'
  | 'timeout'
  | 'transfer'
  | 'remote'
  | 'session';

export interface CompletedJobResult {
  jobId: string;
  status: 'completed';
  videoPath: string;
  remoteJobId?: string;
}

export interface FailedJobResult {
  jobId: string;
  status: 'failed';
  error: string;
  errorKind: GenerationErrorKind;
  remoteJobId?: string;
}

export type JobResult = CompletedJobResult | FailedJobResult;

export interface JobTransition {
  jobId: string;
  status: Exclude<VideoJobStatus, 'pending'>;
  remoteJobId?: string;
  videoPath?: string;
  error?: string;
  errorKind?: GenerationErrorKind;
}

// Remote service, as seen through the transfer client

export type RemoteJobStatus = 'pending' | 'completed' | 'failed';

export interface RemoteJobState {
  status: RemoteJobStatus;
  videoUrl?: string;
  error?: string;
}

export interface GenerationOptions {
  duration: number;
  resolution: string;
}

export interface SubmitJobRequest {
  prompt: string;
  referenceImages: string[];
  options: GenerationOptions;
}

export type PollResult =
  | {
      status: 'completed';
      remoteJobId: string;
      videoUrl?: string;
      polls: number;
    }
  | {
      status: 'failed';
      remoteJobId: string;
      reason: 'remote' | 'timeout' | 'transfer';
      error: string;
      polls: number;
    };
