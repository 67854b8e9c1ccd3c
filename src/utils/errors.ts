// Error types for consistent handling across commands
export enum TrainerErrorType {
  INVALID_INPUT = 'invalid_input',
  RESOURCE_UNAVAILABLE = 'resource_unavailable',
  INTERRUPTED = 'interrupted'
}

export class TrainerError extends Error {
  readonly type: TrainerErrorType;

  constructor(type: TrainerErrorType, message: string) {
    super(message);
    this.name = new.target.name;
    this.type = type;
  }
}

/**
 * Rejected user input, e.g. an empty word. Callers re-prompt.
 */
export class InvalidInputError extends TrainerError {
  constructor(message: string) {
    super(TrainerErrorType.INVALID_INPUT, message);
  }
}

/**
 * An optional capability (speech engine) is missing. Never fatal.
 */
export class ResourceUnavailableError extends TrainerError {
  constructor(message: string) {
    super(TrainerErrorType.RESOURCE_UNAVAILABLE, message);
  }
}

/**
 * The user cancelled interactive input (Ctrl+C or end of input).
 */
export class InterruptedError extends TrainerError {
  constructor(message = 'Input interrupted') {
    super(TrainerErrorType.INTERRUPTED, message);
  }
}

export function isTrainerError(error: unknown, type?: TrainerErrorType): error is TrainerError {
  return error instanceof TrainerError && (type === undefined || error.type === type);
}

// fs rejections are not always Error instances (e.g. under Jest's realm), so check the shape
export function isNotFoundError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
