import { logger } from './logger.js';
import { errorMessage } from './errors.js';
import type { TransferClient } from './transferClient.js';
import type { PollResult, RemoteJobState } from './types.js';

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms))
};

export interface JobPollerOptions {
  clock?: Clock;
  /** Give up after this many failed status requests in a row. Unset means only the deadline stops polling. */
  maxConsecutiveErrors?: number;
  onPoll?: (state: RemoteJobState, attempt: number) => void;
}

export class JobPoller {
  private readonly clock: Clock;
  private readonly maxConsecutiveErrors?: number;
  private readonly onPoll?: (state: RemoteJobState, attempt: number) => void;

  constructor(
    private readonly client: Pick<TransferClient, 'getJobStatus'>,
    options: JobPollerOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.maxConsecutiveErrors = options.maxConsecutiveErrors;
    this.onPoll = options.onPoll;
  }

  async pollUntilDone(remoteJobId: string, intervalMs: number, maxWaitMs: number): Promise<PollResult> {
    const startedAt = this.clock.now();
    let polls = 0;
    let consecutiveErrors = 0;

    while (this.clock.now() - startedAt < maxWaitMs) {
      polls++;
      let state: RemoteJobState | null = null;

      try {
        // A request still in flight at the deadline is cut off there
        const timeLeftMs = Math.max(1, maxWaitMs - (this.clock.now() - startedAt));
        state = await this.client.getJobStatus(remoteJobId, timeLeftMs);
        consecutiveErrors = 0;
      } catch (error) {
        // A failed status request counts as "still pending" for this cycle
        consecutiveErrors++;
        logger.warn({ remoteJobId, attempt: polls, consecutiveErrors, error: errorMessage(error) }, 'Status check failed');

        if (this.maxConsecutiveErrors !== undefined && consecutiveErrors >= this.maxConsecutiveErrors) {
          return {
            status: 'failed',
            remoteJobId,
            reason: 'transfer',
            error: `Status check failed ${consecutiveErrors} times in a row: ${errorMessage(error)}`,
            polls
          };
        }
      }

      if (state) {
        this.onPoll?.(state, polls);

        if (state.status === 'completed') {
          logger.info({ remoteJobId, polls, elapsedMs: this.clock.now() - startedAt }, 'Remote job completed');
          return { status: 'completed', remoteJobId, videoUrl: state.videoUrl, polls };
        }

        if (state.status === 'failed') {
          logger.warn({ remoteJobId, polls, error: state.error }, 'Remote job failed');
          return {
            status: 'failed',
            remoteJobId,
            reason: 'remote',
            error: state.error ?? 'Unknown error',
            polls
          };
        }
      }

      const remaining = maxWaitMs - (this.clock.now() - startedAt);
      if (remaining <= 0) {
        break;
      }
      await this.clock.sleep(Math.min(intervalMs, remaining));
    }

    logger.error({ remoteJobId, polls, maxWaitMs }, 'Timeout waiting for remote job');
    return {
      status: 'failed',
      remoteJobId,
      reason: 'timeout',
      error: 'Timeout waiting for video generation',
      polls
    };
  }
}
