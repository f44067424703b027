import { VideoSession } from './videoSession.js';

/**
 * Live sessions keyed by user id, plus a per-user task queue. Work submitted
 * through runExclusive for the same user runs strictly one after another;
 * different users never wait on each other.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, VideoSession>();
  private readonly queues = new Map<string, Promise<void>>();

  get(userId: string): VideoSession | undefined {
    return this.sessions.get(userId);
  }

  getOrCreate(userId: string): VideoSession {
    const existing = this.sessions.get(userId);
    if (existing) {
      return existing;
    }
    const session = new VideoSession();
    this.sessions.set(userId, session);
    return session;
  }

  set(userId: string, session: VideoSession): void {
    this.sessions.set(userId, session);
  }

  size(): number {
    return this.sessions.size;
  }

  pendingQueues(): number {
    return this.queues.size;
  }

  runExclusive<T>(userId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(userId) ?? Promise.resolve();
    const result = previous.then(task);

    // The tail only orders work; task failures reach the caller through `result`
    const tail: Promise<void> = result.then(
      () => undefined,
      () => undefined
    ).then(() => {
      if (this.queues.get(userId) === tail) {
        this.queues.delete(userId);
      }
    });
    this.queues.set(userId, tail);

    return result;
  }
}
