/**
 * Queue player types and interfaces
 */

import type { AliasRegistry } from '../aliases/AliasRegistry';
import type { AudioHandle, AudioLoader } from './audio';

/**
 * Raw track value accepted from callers
 *
 * A finite number is a catalogue identifier, a string or URL is a path,
 * anything implementing {@link AudioHandle} is used as is.
 */
export type TrackInput = number | string | URL | AudioHandle;

/**
 * Path forms
 */
export type PathInput = string | URL;

/**
 * Track reference resolved from a {@link TrackInput}
 */
export type TrackReference =
  | { readonly kind: 'id'; readonly id: number }
  | { readonly kind: 'path'; readonly path: PathInput }
  | { readonly kind: 'handle'; readonly handle: AudioHandle };

/**
 * Key an alias is registered under
 */
export type AliasKey = string | number | symbol;

/**
 * Anything `load()` accepts: a track value or a registered alias key
 */
export type LoadableSource = TrackInput | AliasKey;

/**
 * Player status
 *
 * `ended` is entered when the queue runs out while looping is off.
 */
export type PlayerState = 'queue-empty' | 'queue-loaded' | 'playing' | 'stopped' | 'ended';

/**
 * Repeating tick source used by the position estimator
 */
export interface IntervalScheduler {
  /**
   * Run `callback` every `ms` milliseconds; returns a function cancelling it
   */
  schedule(callback: () => void, ms: number): () => void;
}

/**
 * Queue player configuration
 */
export interface QueuePlayerConfig {
  /** Decode primitive used to open path and id sources */
  loader: AudioLoader;
  /** Sources loaded on construction */
  queue?: LoadableSource[];
  /** Initial volume (0-1) */
  volume?: number;
  /** Restart from the first track once the queue runs out */
  loop?: boolean;
  /** Keep a timer-based estimate of the playback position */
  estimatePosition?: boolean;
  /** Estimator tick interval in seconds */
  interval?: number;
  /** Alias table consulted during load (defaults to the shared registry) */
  aliases?: AliasRegistry;
  /** Tick source for the estimator (defaults to setInterval) */
  scheduler?: IntervalScheduler;
  /** Enable debug logging */
  debug?: boolean;
}

export interface LoadOptions {
  /** Release everything queued before appending (default false) */
  clearPrevious?: boolean;
  /** Do not look sources up in the alias table (default false) */
  ignoreAliases?: boolean;
}

export interface SkipOptions {
  /** Start the reached track right away (default true) */
  playImmediately?: boolean;
  /** Stop the current track first (default true) */
  stopCurrent?: boolean;
  /** Seek the reached track back to 0 (default true) */
  resetPosition?: boolean;
}

/**
 * Internal message produced for every `stop` notification of a queued handle
 */
export interface TrackStoppedMessage {
  handle: AudioHandle;
  /** True when the stop came from a `stop()`/`unload()` call */
  userInitiated: boolean;
}

/**
 * Snapshot returned by `QueuePlayer.getState()`
 */
export interface QueuePlayerSnapshot {
  status: PlayerState;
  progressIndex: number;
  queueLength: number;
  remaining: number;
  source: string | null;
  length: number | null;
  volume: number;
  loop: boolean;
  positionEstimate: number;
}

export interface TrackChangeEvent {
  /** Source of the track now current, null when none */
  source: string | null;
  /** Source of the track that was current before */
  previous: string | null;
  progressIndex: number;
}

export interface QueueChangeEvent {
  queueLength: number;
  progressIndex: number;
}

export interface QueueEndedEvent {
  queueLength: number;
}

/**
 * Queue player events
 */
export type QueuePlayerEvents = {
  /** Status or queue snapshot changed */
  statechange: QueuePlayerSnapshot;
  /** Current track changed */
  trackchange: TrackChangeEvent;
  /** Tracks added or removed */
  queuechange: QueueChangeEvent;
  /** Volume changed */
  volumechange: number;
  /** Position estimate updated */
  estimate: number;
  /** Queue ran out without looping */
  ended: QueueEndedEvent;
};
