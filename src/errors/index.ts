// Base error class for all chunkline errors
export class ChunklineError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'ChunklineError';
  }
}

// Validation error for schema validation failures at the boundaries
export class ValidationError extends ChunklineError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error: invalid chunk options or a strategy whose collaborator is not wired
export class ConfigError extends ChunklineError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Processing error for failures while chunking or reading input
export class ProcessingError extends ChunklineError {
  constructor(message: string) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

// A single rule of a text processor could not be compiled or applied
export class PatternError extends ChunklineError {
  constructor(message: string, public readonly rule: string) {
    super(message, 'PATTERN_ERROR');
    this.name = 'PatternError';
  }
}

// Cooperative cancellation through an AbortSignal
export class ChunkingCancelledError extends ChunklineError {
  constructor(message = 'Chunking was cancelled') {
    super(message, 'CANCELLED');
    this.name = 'ChunkingCancelledError';
  }
}

// Missing dependency error for when required dependencies are not available
export class MissingDependencyError extends ChunklineError {
  constructor(
    message: string,
    public readonly dependency: string,
    public readonly hint?: string
  ) {
    super(message, 'MISSING_DEPENDENCY');
    this.name = 'MissingDependencyError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ChunkingCancelledError();
  }
}
