/**
 * Contracts of the external decode/output primitive
 *
 * The queue player never decodes audio itself. It drives handles obtained
 * from an {@link AudioLoader} and listens to their notifications.
 */

/**
 * Why a handle stopped playing
 *
 * - `requested`: `stop()` or `unload()` was called on the handle
 * - `finished`: playback reached the end of the source
 */
export type StopReason = 'requested' | 'finished';

export interface PlayStartedEvent {
  source: string;
}

export interface PlayStoppedEvent {
  source: string;
  reason: StopReason;
}

/**
 * Notifications every handle emits
 */
export type AudioHandleEvents = {
  play: PlayStartedEvent;
  stop: PlayStoppedEvent;
};

export type AudioHandleListener<K extends keyof AudioHandleEvents> = (
  data: AudioHandleEvents[K]
) => void;

/**
 * Playable handle bound to one decoded audio source
 */
export interface AudioHandle {
  /** Source the handle was loaded from */
  readonly source: string;
  /** Track length in seconds */
  readonly length: number;
  /** Output volume (0-1) */
  volume: number;

  play(): void;
  stop(): void;
  seek(position: number): void;
  /** Current position in seconds */
  getPosition(): number;
  /** Release the decoded source */
  unload(): void;

  on<K extends keyof AudioHandleEvents>(event: K, listener: AudioHandleListener<K>): unknown;
  off<K extends keyof AudioHandleEvents>(event: K, listener: AudioHandleListener<K>): unknown;
}

/**
 * Resolves a source string into a playable handle, or `null` when the
 * resource cannot be opened
 */
export interface AudioLoader {
  load(source: string): AudioHandle | null;
}

const HANDLE_METHODS = ['play', 'stop', 'seek', 'getPosition', 'unload', 'on', 'off'] as const;

/**
 * Type guard for objects implementing {@link AudioHandle}
 */
export function isAudioHandle(value: unknown): value is AudioHandle {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'source' in value &&
    typeof value.source === 'string' &&
    'length' in value &&
    typeof value.length === 'number' &&
    HANDLE_METHODS.every((method) => typeof Reflect.get(value, method) === 'function')
  );
}
