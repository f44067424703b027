import { InvalidPromptError, InvalidStateTransitionError } from '../errors.js';
import type { VideoSessionSnapshot, VideoSessionState } from '../types.js';

export const MAX_SESSION_PHOTOS = 4;

export interface SessionInput {
  photos: string[];
  prompt: string;
}

/**
 * Collects one user's reference photos and prompt.
 *
 * idle -> collecting_photos -> waiting_for_prompt -> processing, with reset()
 * returning to idle from anywhere. A processing session only accepts reset().
 */
export class VideoSession {
  private current: VideoSessionSnapshot = { state: 'idle', photos: [], prompt: null };

  static restore(snapshot: VideoSessionSnapshot): VideoSession {
    const session = new VideoSession();
    const photos = snapshot.photos.slice(0, MAX_SESSION_PHOTOS);
    const prompt = snapshot.prompt?.trim() ? snapshot.prompt.trim() : null;
    let state = snapshot.state;
    if ((state === 'waiting_for_prompt' || state === 'processing') && prompt === null) {
      state = photos.length > 0 ? 'collecting_photos' : 'idle';
    }
    session.current = { state, photos, prompt };
    return session;
  }

  get state(): VideoSessionState {
    return this.current.state;
  }

  get photos(): readonly string[] {
    return this.current.photos;
  }

  get prompt(): string | null {
    return this.current.prompt;
  }

  addPhoto(ref: string): boolean {
    if (!ref) {
      return false;
    }
    if (this.current.state === 'idle') {
      this.current.state = 'collecting_photos';
    }
    if (this.current.state !== 'collecting_photos') {
      return false;
    }
    if (this.current.photos.length >= MAX_SESSION_PHOTOS) {
      return false;
    }
    this.current.photos.push(ref);
    return true;
  }

  setPrompt(text: string): void {
    if (this.current.state === 'processing') {
      throw new InvalidStateTransitionError(this.current.state, 'set a prompt');
    }
    const prompt = text.trim();
    if (!prompt) {
      throw new InvalidPromptError();
    }
    this.current.prompt = prompt;
    this.current.state = 'waiting_for_prompt';
  }

  isReady(): boolean {
    return (
      this.current.photos.length >= 1 &&
      this.current.prompt !== null &&
      this.current.state === 'waiting_for_prompt'
    );
  }

  startProcessing(): SessionInput {
    const { prompt } = this.current;
    if (!this.isReady() || prompt === null) {
      throw new InvalidStateTransitionError(this.current.state, 'start processing');
    }
    this.current.state = 'processing';
    return { photos: [...this.current.photos], prompt };
  }

  reset(): void {
    this.current = { state: 'idle', photos: [], prompt: null };
  }

  snapshot(): VideoSessionSnapshot {
    return {
      state: this.current.state,
      photos: [...this.current.photos],
      prompt: this.current.prompt
    };
  }
}
