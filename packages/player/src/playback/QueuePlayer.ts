/**
 * QueuePlayer - queue and transport engine
 *
 * Features:
 * - Ordered queue of handles from an external decode primitive
 * - Transport controls (play, stop, seek, skip, fast-forward, rewind)
 * - Auto-advance when a track ends on its own, never after stop()
 * - Loop-around at the end of the queue
 * - Timer-based position estimate between coarse ticks
 * - Alias lookup during load
 * - Event system
 */

import type {
  AliasKey,
  AudioHandle,
  AudioHandleListener,
  AudioLoader,
  IntervalScheduler,
  LoadableSource,
  LoadOptions,
  PlayerState,
  QueuePlayerConfig,
  QueuePlayerEvents,
  QueuePlayerSnapshot,
  SkipOptions,
  TrackReference,
  TrackStoppedMessage,
} from '../types';
import { EmptyQueueError, NoActiveTrackError } from '../types';
import { globalAliases } from '../aliases/AliasRegistry';
import type { AliasRegistry } from '../aliases/AliasRegistry';
import { NumberConversion, TrackConversion } from '../conversion/TypeConversion';
import { PositionEstimator } from './PositionEstimator';
import { EventEmitter } from '../utils/events';
import type { EventListener } from '../utils/events';
import { humanizeDuration } from '../utils/duration';
import { normalizeIndex } from '../utils/indexing';
import { validate, validateRange } from '../utils/validation';
import { QueuePlayerConfigSchema } from '../utils/validators';
import { PlayerLogger } from '../utils/logger';

const logger = PlayerLogger.child('QueuePlayer');

interface ResolvedConfig {
  loader: AudioLoader;
  loop: boolean;
  estimatePosition: boolean;
  interval: number;
  aliases: AliasRegistry;
  scheduler: IntervalScheduler | undefined;
  debug: boolean;
}

interface HandleBinding {
  onPlay: AudioHandleListener<'play'>;
  onStop: AudioHandleListener<'stop'>;
}

/**
 * Result of moving the progress index
 *
 * - `moved`: a track at the new index is current
 * - `wrapped`: ran past the end with looping on; `handle` (index 0) is playing
 * - `ended`: ran past the end with looping off; nothing is current
 */
type JumpOutcome =
  | { kind: 'moved'; handle: AudioHandle }
  | { kind: 'wrapped'; handle: AudioHandle }
  | { kind: 'ended' };

const DEFAULT_SKIP_SECONDS = 10;

function isAliasKey(value: unknown): value is AliasKey {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'symbol';
}

export class QueuePlayer implements Iterable<AudioHandle> {
  private config: ResolvedConfig;
  private queue: AudioHandle[] = [];
  private progressIndex = -1;
  private current: AudioHandle | null = null;
  private status: PlayerState = 'queue-empty';
  private volume: number;
  private estimator: PositionEstimator;
  private bindings = new Map<AudioHandle, HandleBinding>();
  /** Handles opened through the loader; only these are unloaded on release */
  private owned = new Set<AudioHandle>();
  private events = new EventEmitter<QueuePlayerEvents>();

  constructor(config: QueuePlayerConfig) {
    validate(QueuePlayerConfigSchema, config, 'QueuePlayerConfig');

    this.config = {
      loader: config.loader,
      loop: config.loop ?? false,
      estimatePosition: config.estimatePosition ?? true,
      interval: config.interval ?? 1,
      aliases: config.aliases ?? globalAliases,
      scheduler: config.scheduler,
      debug: config.debug ?? false,
    };
    this.volume = config.volume ?? 1;

    if (this.config.debug) {
      PlayerLogger.configure({ enabled: true, level: 'debug' });
    }

    this.estimator = new PositionEstimator({
      interval: this.config.interval,
      scheduler: this.config.scheduler,
      onChange: (estimate) => this.events.emit('estimate', estimate),
    });

    if (config.queue && config.queue.length > 0) {
      this.load(config.queue);
    }

    logger.debug('Initialized', {
      loop: this.config.loop,
      estimatePosition: this.config.estimatePosition,
      interval: this.config.interval,
      volume: this.volume,
    });
  }

  // ============================================================================
  // Queue Management
  // ============================================================================

  /**
   * Append tracks to the queue
   *
   * Every source is resolved before the queue changes, so a source that
   * fails to resolve leaves the queue as it was.
   *
   * @throws TypeConversionError for values that are not track values
   * @throws LoadError when the loader cannot open a source
   */
  load(sources: readonly LoadableSource[], options: LoadOptions = {}): void {
    const { clearPrevious = false, ignoreAliases = false } = options;

    const incoming: AudioHandle[] = [];
    const opened: AudioHandle[] = [];
    try {
      for (const source of sources) {
        const reference = this.resolveReference(source, ignoreAliases);
        const handle = TrackConversion.asHandle(reference, this.config.loader);
        if (reference.kind !== 'handle') {
          opened.push(handle);
        }
        incoming.push(handle);
      }
    } catch (error) {
      // Handles passed in by the caller stay theirs until the load succeeds
      opened.forEach((handle) => handle.unload());
      throw error;
    }

    if (clearPrevious) {
      this.releaseQueue(new Set(incoming));
    }

    opened.forEach((handle) => this.owned.add(handle));
    for (const handle of incoming) {
      this.configureHandle(handle);
      this.queue.push(handle);
    }

    // A running track keeps the player in `playing`
    if (incoming.length > 0 && this.queue.length > 0 && this.status !== 'playing') {
      this.setStatus('queue-loaded');
    }

    if (incoming.length > 0 || clearPrevious) {
      this.emitQueueChange();
    }

    logger.debug('Loaded', {
      added: incoming.length,
      queueLength: this.queue.length,
      clearPrevious,
    });
  }

  /**
   * Release every queued handle and forget the current track
   */
  clearQueue(): void {
    this.releaseQueue(new Set());
    this.emitQueueChange();
  }

  /**
   * Shut the player down: releases the current handle and the queue
   */
  unload(): void {
    this.releaseQueue(new Set());
    this.emitQueueChange();

    logger.debug('Unloaded');
  }

  // ============================================================================
  // Playback Controls
  // ============================================================================

  /**
   * Play the current track, or the first one when none is current
   *
   * @throws EmptyQueueError when nothing is queued
   */
  play(): void {
    if (this.queue.length === 0) {
      throw new EmptyQueueError('Cannot play: the queue is empty');
    }

    let handle = this.current;
    if (!handle) {
      const outcome = this.jumpToIndex(0);
      if (outcome.kind !== 'moved') return;
      handle = outcome.handle;
    }

    handle.play();
    this.setStatus('playing');

    logger.debug('Playing', { source: handle.source, progressIndex: this.progressIndex });
  }

  /**
   * Stop the current track without advancing
   *
   * The handle reports this stop as requested, which keeps the queue where
   * it is.
   *
   * @throws NoActiveTrackError when no track is current
   */
  stop(): void {
    const handle = this.requireCurrent('stop');
    handle.stop();
    this.setStatus('stopped');

    logger.debug('Stopped', { source: handle.source });
  }

  getPosition(): number {
    return this.requireCurrent('read the position').getPosition();
  }

  seek(position: number): void {
    NumberConversion.isAllowed(position);
    const handle = this.requireCurrent('seek');
    handle.seek(position);

    if (this.config.estimatePosition) {
      this.estimator.update(Math.min(Math.max(position, 0), handle.length));
    }
  }

  /**
   * Jump ahead, stopping at the end of the track
   */
  fastForward(seconds = DEFAULT_SKIP_SECONDS): void {
    NumberConversion.isAllowed(seconds);
    const handle = this.requireCurrent('fast-forward');
    this.seek(Math.min(handle.getPosition() + seconds, handle.length));
  }

  /**
   * Jump back, stopping at the start of the track
   */
  rewind(seconds = DEFAULT_SKIP_SECONDS): void {
    NumberConversion.isAllowed(seconds);
    const handle = this.requireCurrent('rewind');
    this.seek(Math.max(handle.getPosition() - seconds, 0));
  }

  skipToNext(options: SkipOptions = {}): void {
    const { stopCurrent = true } = options;

    if (stopCurrent && this.current) {
      this.stop();
    }

    this.finishSkip(this.jumpToIndex(this.progressIndex + 1), options);
  }

  /**
   * Move to the previous track; from the first track this wraps to the last
   *
   * @throws IndexOutOfRangeError when the queue is too short to step back
   */
  skipToPrevious(options: SkipOptions = {}): void {
    const { stopCurrent = true } = options;
    const target = normalizeIndex(this.queue, this.progressIndex - 1);

    if (stopCurrent && this.current) {
      this.stop();
    }

    this.finishSkip(this.jumpToIndex(target), options);
  }

  // ============================================================================
  // Volume & Loop
  // ============================================================================

  getVolume(): number {
    return this.volume;
  }

  /**
   * Set the volume of every queued handle
   *
   * @throws TypeConversionError when `volume` is not a number
   * @throws ValidationError when `volume` is outside 0-1
   */
  setVolume(volume: number): void {
    NumberConversion.isAllowed(volume);
    validateRange(volume, 0, 1, 'Volume');

    this.volume = volume;
    for (const handle of this.queue) {
      handle.volume = volume;
    }

    this.events.emit('volumechange', volume);
  }

  isLooping(): boolean {
    return this.config.loop;
  }

  setLoop(loop: boolean): void {
    this.config.loop = loop;
    this.emitStateChange();
  }

  // ============================================================================
  // State & Info
  // ============================================================================

  getProgressIndex(): number {
    return this.progressIndex;
  }

  getStatus(): PlayerState {
    return this.status;
  }

  getSource(): string | null {
    return this.current?.source ?? null;
  }

  getLength(): number | null {
    return this.current?.length ?? null;
  }

  getHumanizedLength(): string | null {
    const length = this.getLength();
    return length === null ? null : humanizeDuration(length);
  }

  getPositionEstimate(): number {
    return this.estimator.getEstimate();
  }

  getHumanizedPositionEstimate(): string {
    return humanizeDuration(this.estimator.getEstimate());
  }

  getState(): Readonly<QueuePlayerSnapshot> {
    return {
      status: this.status,
      progressIndex: this.progressIndex,
      queueLength: this.queue.length,
      remaining: this.length,
      source: this.getSource(),
      length: this.getLength(),
      volume: this.volume,
      loop: this.config.loop,
      positionEstimate: this.estimator.getEstimate(),
    };
  }

  /**
   * Tracks after the current one
   */
  *[Symbol.iterator](): Iterator<AudioHandle> {
    yield* this.queue.slice(this.progressIndex + 1);
  }

  /**
   * Number of tracks after the current one
   */
  get length(): number {
    return this.queue.length - (this.progressIndex + 1);
  }

  /**
   * Whether `handle` is still ahead in the queue
   */
  includes(handle: AudioHandle): boolean {
    return this.queue.indexOf(handle, this.progressIndex + 1) !== -1;
  }

  toString(): string {
    return `QueuePlayer(length=${this.length}, loop=${this.config.loop})`;
  }

  // ============================================================================
  // Event System
  // ============================================================================

  on<K extends keyof QueuePlayerEvents>(event: K, listener: EventListener<QueuePlayerEvents[K]>): void {
    this.events.on(event, listener);
  }

  off<K extends keyof QueuePlayerEvents>(event: K, listener: EventListener<QueuePlayerEvents[K]>): void {
    this.events.off(event, listener);
  }

  once<K extends keyof QueuePlayerEvents>(event: K, listener: EventListener<QueuePlayerEvents[K]>): void {
    this.events.once(event, listener);
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private resolveReference(source: LoadableSource, ignoreAliases: boolean): TrackReference {
    if (!ignoreAliases && isAliasKey(source)) {
      const aliased = this.config.aliases.getAlias(source);
      if (aliased) return aliased;
    }
    return TrackConversion.toReference(source);
  }

  private configureHandle(handle: AudioHandle): void {
    handle.volume = this.volume;

    // The same handle may be queued twice; it is bound once
    if (this.bindings.has(handle)) return;

    const binding: HandleBinding = {
      onPlay: () => this.handlePlayStarted(),
      onStop: (event) =>
        this.handleTrackStopped({ handle, userInitiated: event.reason === 'requested' }),
    };
    handle.on('play', binding.onPlay);
    handle.on('stop', binding.onStop);
    this.bindings.set(handle, binding);
  }

  private handlePlayStarted(): void {
    if (this.config.estimatePosition) {
      this.estimator.start();
    }
  }

  /**
   * Advance protocol: a track that ends on its own moves the queue forward;
   * a requested stop only halts the estimate
   */
  private handleTrackStopped(message: TrackStoppedMessage): void {
    if (message.handle !== this.current) {
      logger.debug('Ignoring stop of inactive track', { source: message.handle.source });
      return;
    }

    this.estimator.cancel();
    if (message.userInitiated) return;

    logger.debug('Track finished', { source: message.handle.source });
    this.estimator.reset();
    this.skipToNext({ stopCurrent: false });
  }

  /**
   * Point the queue at `index`
   *
   * Running off either end is not an error: the index resets to -1 and the
   * queue either loops or ends.
   */
  private jumpToIndex(index: number): JumpOutcome {
    const previous = this.current;

    if (index < 0 || index >= this.queue.length) {
      this.progressIndex = -1;
      this.current = null;
      this.emitTrackChange(previous);

      if (this.queue.length === 0) {
        return { kind: 'ended' };
      }

      if (this.config.loop) {
        logger.debug('Looping back to the first track');
        const restarted = this.jumpToIndex(0);
        if (restarted.kind !== 'moved') return restarted;
        this.play();
        return { kind: 'wrapped', handle: restarted.handle };
      }

      this.setStatus('ended');
      this.events.emit('ended', { queueLength: this.queue.length });
      logger.debug('Queue ended', { queueLength: this.queue.length });
      return { kind: 'ended' };
    }

    const handle = this.queue[index];
    this.progressIndex = index;
    this.current = handle;
    this.emitTrackChange(previous);
    return { kind: 'moved', handle };
  }

  private finishSkip(outcome: JumpOutcome, options: SkipOptions): void {
    if (outcome.kind === 'ended') return;

    const { playImmediately = true, resetPosition = true } = options;
    if (resetPosition) {
      // The estimate is left alone on manual skips
      outcome.handle.seek(0);
    }
    // A wrap has already restarted playback
    if (playImmediately && outcome.kind === 'moved') {
      this.play();
    }
  }

  private requireCurrent(operation: string): AudioHandle {
    if (!this.current) {
      throw new NoActiveTrackError(`Cannot ${operation}: no track is active`, {
        status: this.status,
        progressIndex: this.progressIndex,
      });
    }
    return this.current;
  }

  /**
   * Detach queued handles, except those in `keep`
   *
   * Handles the player opened are unloaded. Caller and alias handles are
   * only stopped and stay usable.
   */
  private releaseQueue(keep: Set<AudioHandle>): void {
    this.estimator.cancel();

    for (const [handle, binding] of this.bindings) {
      if (keep.has(handle)) continue;
      handle.off('play', binding.onPlay);
      handle.off('stop', binding.onStop);
      if (this.owned.delete(handle)) {
        handle.unload();
      } else {
        handle.stop();
      }
      this.bindings.delete(handle);
    }

    const previous = this.current;
    this.queue = [];
    this.progressIndex = -1;
    this.current = null;
    this.estimator.reset();

    if (previous) {
      this.emitTrackChange(previous);
    }
    this.setStatus('queue-empty');
  }

  private setStatus(status: PlayerState): void {
    if (this.status === status) return;
    this.status = status;
    this.emitStateChange();
  }

  private emitStateChange(): void {
    this.events.emit('statechange', this.getState());
  }

  private emitTrackChange(previous: AudioHandle | null): void {
    if (previous === this.current) return;
    this.events.emit('trackchange', {
      source: this.getSource(),
      previous: previous?.source ?? null,
      progressIndex: this.progressIndex,
    });
  }

  private emitQueueChange(): void {
    this.events.emit('queuechange', {
      queueLength: this.queue.length,
      progressIndex: this.progressIndex,
    });
  }

  /**
   * Release the queue and drop every listener
   */
  destroy(): void {
    this.releaseQueue(new Set());
    this.events.removeAllListeners();

    logger.debug('Destroyed');
  }
}
