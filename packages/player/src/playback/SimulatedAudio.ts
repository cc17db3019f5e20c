/**
 * SimulatedAudio - in-memory stand-in for a decode/output primitive
 *
 * Handles keep no audio data. Position follows the wall clock while
 * playing and the natural end is a timer, so a queue can be driven
 * headlessly or under fake timers in tests.
 */

import type { AudioHandle, AudioHandleEvents, AudioLoader } from '../types/audio';
import { HandleReleasedError } from '../types/errors';
import { EventEmitter } from '../utils/events';
import { PlayerLogger } from '../utils/logger';

const logger = PlayerLogger.child('SimulatedAudio');

export class SimulatedAudioHandle extends EventEmitter<AudioHandleEvents> implements AudioHandle {
  volume = 1;
  private position = 0;
  private startedAt: number | null = null;
  private endTimer: ReturnType<typeof setTimeout> | null = null;
  private released = false;

  constructor(
    readonly source: string,
    readonly length: number
  ) {
    super({ maxListeners: 4 });
  }

  play(): void {
    if (this.released) {
      throw new HandleReleasedError(`Cannot play released source: ${this.source}`, this.source);
    }
    if (this.startedAt !== null) return;

    this.startedAt = Date.now();
    this.scheduleEnd();
    this.emit('play', { source: this.source });

    logger.debug('Playing', { source: this.source, position: this.position });
  }

  stop(): void {
    if (this.startedAt === null) return;

    this.position = this.getPosition();
    this.halt();
    this.emit('stop', { source: this.source, reason: 'requested' });

    logger.debug('Stopped', { source: this.source, position: this.position });
  }

  seek(position: number): void {
    const wasPlaying = this.startedAt !== null;
    this.position = Math.max(0, Math.min(position, this.length));

    if (wasPlaying) {
      this.startedAt = Date.now();
      this.scheduleEnd();
    }
  }

  getPosition(): number {
    if (this.startedAt === null) return this.position;
    const elapsed = (Date.now() - this.startedAt) / 1000;
    return Math.min(this.position + elapsed, this.length);
  }

  unload(): void {
    this.stop();
    this.released = true;
    this.removeAllListeners();
  }

  isPlaying(): boolean {
    return this.startedAt !== null;
  }

  isReleased(): boolean {
    return this.released;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private scheduleEnd(): void {
    if (this.endTimer) {
      clearTimeout(this.endTimer);
    }
    const remainingMs = Math.max(0, (this.length - this.position) * 1000);
    this.endTimer = setTimeout(() => this.finish(), remainingMs);
  }

  private halt(): void {
    if (this.endTimer) {
      clearTimeout(this.endTimer);
      this.endTimer = null;
    }
    this.startedAt = null;
  }

  private finish(): void {
    this.endTimer = null;
    this.halt();
    this.position = 0;
    this.emit('stop', { source: this.source, reason: 'finished' });

    logger.debug('Finished', { source: this.source });
  }
}

/**
 * Loader over a fixed table of source → length (seconds)
 *
 * Unknown sources yield `null`, the way a real primitive reports a source
 * it cannot open.
 */
export class SimulatedAudioLoader implements AudioLoader {
  private readonly library: Map<string, number>;
  private readonly loaded: SimulatedAudioHandle[] = [];

  constructor(library: Record<string, number> | Map<string, number>) {
    this.library = library instanceof Map ? new Map(library) : new Map(Object.entries(library));
  }

  load(source: string): SimulatedAudioHandle | null {
    const length = this.library.get(source);
    if (length === undefined) {
      return null;
    }

    const handle = new SimulatedAudioHandle(source, length);
    this.loaded.push(handle);
    return handle;
  }

  /**
   * Every handle this loader produced, oldest first
   */
  getLoadedHandles(): SimulatedAudioHandle[] {
    return [...this.loaded];
  }
}
