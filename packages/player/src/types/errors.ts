/**
 * Custom error classes
 */

export class QueuePlayerError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    public readonly originalError?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'QueuePlayerError';
    this.timestamp = new Date();
    this.context = context;
    Object.setPrototypeOf(this, QueuePlayerError.prototype);

    // Capture stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON for logging/debugging
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * A value's runtime type is outside the set a conversion accepts
 */
export class TypeConversionError extends QueuePlayerError {
  constructor(
    message: string,
    public readonly allowedTypes: readonly string[],
    context?: Record<string, unknown>
  ) {
    super(message, 'TYPE_CONVERSION_ERROR', undefined, { allowedTypes, ...context });
    this.name = 'TypeConversionError';
    Object.setPrototypeOf(this, TypeConversionError.prototype);
  }
}

export class ValidationError extends QueuePlayerError {
  constructor(
    message: string,
    public readonly validationErrors?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', validationErrors, context);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * The audio loader could not open a source
 */
export class LoadError extends QueuePlayerError {
  constructor(
    message: string,
    public readonly source: string,
    originalError?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'LOAD_ERROR', originalError, { source, ...context });
    this.name = 'LoadError';
    Object.setPrototypeOf(this, LoadError.prototype);
  }
}

/**
 * A handle was used after its source was released
 */
export class HandleReleasedError extends QueuePlayerError {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(message, 'HANDLE_RELEASED', undefined, { source });
    this.name = 'HandleReleasedError';
    Object.setPrototypeOf(this, HandleReleasedError.prototype);
  }
}

export class IndexOutOfRangeError extends QueuePlayerError {
  constructor(
    message: string,
    public readonly index: number,
    public readonly length: number
  ) {
    super(message, 'INDEX_OUT_OF_RANGE', undefined, { index, length });
    this.name = 'IndexOutOfRangeError';
    Object.setPrototypeOf(this, IndexOutOfRangeError.prototype);
  }
}

export class EmptyQueueError extends QueuePlayerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'EMPTY_QUEUE', undefined, context);
    this.name = 'EmptyQueueError';
    Object.setPrototypeOf(this, EmptyQueueError.prototype);
  }
}

export class NoActiveTrackError extends QueuePlayerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NO_ACTIVE_TRACK', undefined, context);
    this.name = 'NoActiveTrackError';
    Object.setPrototypeOf(this, NoActiveTrackError.prototype);
  }
}
