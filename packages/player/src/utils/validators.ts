/**
 * Zod schemas for runtime validation of caller-supplied values
 */

import { z } from 'zod';
import { isAudioHandle } from '../types/audio';
import type { AudioHandle, AudioLoader } from '../types/audio';
import type { IntervalScheduler } from '../types/player';

// ============================================================================
// Track Schemas
// ============================================================================

export const AudioHandleSchema = z.custom<AudioHandle>(isAudioHandle, {
  message: 'Expected an audio handle',
});

export const FiniteNumberSchema = z.number().finite();

export const PathInputSchema = z.union([z.string(), z.instanceof(URL)]);

export const TrackInputSchema = z.union([
  FiniteNumberSchema,
  z.string(),
  z.instanceof(URL),
  AudioHandleSchema,
]);

// ============================================================================
// Player Configuration Schemas
// ============================================================================

export const VolumeSchema = z.number().min(0).max(1);

export const IntervalSchema = z.number().finite().positive();

export const AudioLoaderSchema = z.custom<AudioLoader>(
  (value) =>
    typeof value === 'object' && value !== null && typeof Reflect.get(value, 'load') === 'function',
  { message: 'Expected an audio loader with a load() method' }
);

export const IntervalSchedulerSchema = z.custom<IntervalScheduler>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'schedule') === 'function',
  { message: 'Expected a scheduler with a schedule() method' }
);

export const QueuePlayerConfigSchema = z.object({
  loader: AudioLoaderSchema,
  queue: z.array(z.unknown()).optional(),
  volume: VolumeSchema.optional(),
  loop: z.boolean().optional(),
  estimatePosition: z.boolean().optional(),
  interval: IntervalSchema.optional(),
  scheduler: IntervalSchedulerSchema.optional(),
  debug: z.boolean().optional(),
});

export const PositionEstimatorOptionsSchema = z.object({
  interval: IntervalSchema,
  scheduler: IntervalSchedulerSchema.optional(),
});
