/**
 * Core type definitions for trackdeck
 */

export type {
  StopReason,
  PlayStartedEvent,
  PlayStoppedEvent,
  AudioHandleEvents,
  AudioHandleListener,
  AudioHandle,
  AudioLoader,
} from './audio';
export { isAudioHandle } from './audio';

export type {
  TrackInput,
  PathInput,
  TrackReference,
  AliasKey,
  LoadableSource,
  PlayerState,
  IntervalScheduler,
  QueuePlayerConfig,
  LoadOptions,
  SkipOptions,
  TrackStoppedMessage,
  QueuePlayerSnapshot,
  TrackChangeEvent,
  QueueChangeEvent,
  QueueEndedEvent,
  QueuePlayerEvents,
} from './player';

export {
  QueuePlayerError,
  TypeConversionError,
  ValidationError,
  LoadError,
  HandleReleasedError,
  IndexOutOfRangeError,
  EmptyQueueError,
  NoActiveTrackError,
} from './errors';
