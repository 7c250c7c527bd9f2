/**
 * Audio cache - maps audio ids to synthesized files for the audio endpoint
 */
import type { AudioHandle } from '../types/index';

export const AUDIO_ROUTE_PREFIX = '/api/audio';

/**
 * In-memory registry of synthesized audio
 *
 * Entries are never evicted: a handle lives as long as the process, so memory and temp
 * files grow with every synthesized reply. `size` exposes the growth for monitoring.
 */
export class AudioCacheService {
  private readonly handles = new Map<string, AudioHandle>();
  private readonly memoized = new Map<string, Promise<string | null>>();

  /**
   * Registers a handle and returns the URL it is served from
   */
  register(handle: AudioHandle): string {
    this.handles.set(handle.id, handle);
    return this.urlFor(handle.id);
  }

  get(id: string): AudioHandle | undefined {
    return this.handles.get(id);
  }

  urlFor(id: string): string {
    return `${AUDIO_ROUTE_PREFIX}/${id}`;
  }

  get size(): number {
    return this.handles.size;
  }

  /**
   * Produces a URL once per key and reuses it afterwards
   * Concurrent callers share the pending promise; a null result or a rejection is not
   * kept, so the next caller tries again.
   */
  memoize(key: string, produce: () => Promise<string | null>): Promise<string | null> {
    const existing = this.memoized.get(key);
    if (existing) {
      return existing;
    }

    const pending = produce().then(
      (url) => {
        if (url === null) {
          this.memoized.delete(key);
        }
        return url;
      },
      (error: unknown) => {
        this.memoized.delete(key);
        throw error;
      }
    );
    this.memoized.set(key, pending);
    return pending;
  }
}
