/**
 * trackdeck
 *
 * Playback-queue coordinator layered over an external audio decode
 * primitive
 *
 * @packageDocumentation
 */

// Types
export type {
  // Audio primitive
  StopReason,
  PlayStartedEvent,
  PlayStoppedEvent,
  AudioHandleEvents,
  AudioHandleListener,
  AudioHandle,
  AudioLoader,

  // Player
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
} from './types';

// Errors
export {
  isAudioHandle,
  QueuePlayerError,
  TypeConversionError,
  ValidationError,
  LoadError,
  HandleReleasedError,
  IndexOutOfRangeError,
  EmptyQueueError,
  NoActiveTrackError,
} from './types';

// Playback Module
export {
  QueuePlayer,
  PositionEstimator,
  timerScheduler,
  SimulatedAudioHandle,
  SimulatedAudioLoader,
  type PositionEstimatorOptions,
} from './playback';

// Conversion & Aliases
export { NumberConversion, PathConversion, TrackConversion } from './conversion';
export { AliasRegistry, globalAliases } from './aliases';

// Utilities
export { humanizeDuration, parseDuration } from './utils/duration';
export { normalizeIndex } from './utils/indexing';
export { Logger, createLogger, PlayerLogger, isLogLevel } from './utils/logger';
export type { LogLevel, LogEntry, LoggerConfig } from './utils/logger';
export { EventEmitter, createEventEmitter } from './utils/events';
export type { EventListener, EventMap } from './utils/events';
export { validate, validateSafe, validateRange, isValidationError, isZodError } from './utils/validation';
export {
  TrackInputSchema,
  PathInputSchema,
  VolumeSchema,
  IntervalSchema,
  QueuePlayerConfigSchema,
} from './utils/validators';

// Version
export const VERSION = '0.1.0';
