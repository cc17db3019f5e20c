/**
 * Playback Module
 *
 * Queue/transport engine, position estimation and an in-memory audio
 * primitive
 */

export { QueuePlayer } from './QueuePlayer';
export { PositionEstimator, timerScheduler, type PositionEstimatorOptions } from './PositionEstimator';
export { SimulatedAudioHandle, SimulatedAudioLoader } from './SimulatedAudio';
