/**
 * Type/Conversion Gate
 *
 * Checks caller-supplied values against the shapes each conversion accepts
 * and turns track values into playable handles.
 */

import { fileURLToPath, pathToFileURL } from 'node:url';
import type { z } from 'zod';
import type { AudioHandle, AudioLoader } from '../types/audio';
import type { PathInput, TrackInput, TrackReference } from '../types/player';
import { LoadError, QueuePlayerError, TypeConversionError } from '../types/errors';
import { FiniteNumberSchema, PathInputSchema, TrackInputSchema } from '../utils/validators';
import { PlayerLogger } from '../utils/logger';

const logger = PlayerLogger.child('TypeConversion');

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

function assertAllowed(schema: z.ZodTypeAny, allowedTypes: readonly string[], value: unknown): void {
  if (!schema.safeParse(value).success) {
    throw new TypeConversionError(
      `only ${allowedTypes.join(', ')} types are accepted, got ${describeType(value)}`,
      allowedTypes,
      { receivedType: describeType(value) }
    );
  }
}

export class NumberConversion {
  static readonly allowedTypes: readonly string[] = ['number'];

  /**
   * @throws TypeConversionError unless `value` is a finite number
   */
  static isAllowed(value: unknown): asserts value is number {
    assertAllowed(FiniteNumberSchema, NumberConversion.allowedTypes, value);
  }

  /**
   * Truncate toward zero
   */
  static asInt(value: number): number {
    return Math.trunc(value);
  }
}

export class PathConversion {
  static readonly allowedTypes: readonly string[] = ['string', 'URL'];

  static isAllowed(value: unknown): asserts value is PathInput {
    assertAllowed(PathInputSchema, PathConversion.allowedTypes, value);
  }

  /**
   * File URLs become file-system paths, other URLs keep their href
   */
  static asString(path: PathInput): string {
    if (typeof path === 'string') return path;
    return path.protocol === 'file:' ? fileURLToPath(path) : path.href;
  }

  /**
   * Strings become `file:` URLs
   */
  static asPathObject(path: PathInput): URL {
    return typeof path === 'string' ? pathToFileURL(path) : path;
  }
}

export class TrackConversion {
  static readonly allowedTypes: readonly string[] = ['number', 'string', 'URL', 'AudioHandle'];

  static isAllowed(value: unknown): asserts value is TrackInput {
    assertAllowed(TrackInputSchema, TrackConversion.allowedTypes, value);
  }

  /**
   * Validate a raw value and tag it with the shape it has
   */
  static toReference(value: unknown): TrackReference {
    TrackConversion.isAllowed(value);

    if (typeof value === 'number') return { kind: 'id', id: value };
    if (typeof value === 'string' || value instanceof URL) return { kind: 'path', path: value };
    return { kind: 'handle', handle: value };
  }

  /**
   * Handle source, path string, or decimal catalogue id
   */
  static asString(reference: TrackReference): string {
    switch (reference.kind) {
      case 'id':
        return String(reference.id);
      case 'path':
        return PathConversion.asString(reference.path);
      case 'handle':
        return reference.handle.source;
    }
  }

  static asPathObject(reference: TrackReference): URL {
    if (reference.kind === 'path') return PathConversion.asPathObject(reference.path);
    return PathConversion.asPathObject(TrackConversion.asString(reference));
  }

  /**
   * Resolve a reference into a playable handle
   *
   * Handles pass through unchanged; everything else is opened through the
   * loader.
   *
   * @throws LoadError when the loader returns no handle or throws
   */
  static asHandle(reference: TrackReference, loader: AudioLoader): AudioHandle {
    if (reference.kind === 'handle') {
      return reference.handle;
    }

    const source = TrackConversion.asString(reference);
    let handle: AudioHandle | null;
    try {
      handle = loader.load(source);
    } catch (error) {
      if (error instanceof QueuePlayerError) throw error;
      logger.error('Loader threw', { source, error });
      throw new LoadError(`Unable to load audio source: ${source}`, source, error);
    }

    if (!handle) {
      logger.warn('Loader returned no handle', { source });
      throw new LoadError(`Unable to load audio source: ${source}`, source);
    }

    logger.debug('Loaded', { source, length: handle.length });
    return handle;
  }
}
