export type UpdateCheckerErrorCode =
  | 'INVALID_FORMAT'
  | 'MISSING_LOGGER'
  | 'NO_PRIOR_CHECK'
  | 'NO_LOGGER'
  | 'REPOSITORY_NOT_FOUND'
  | 'MISSING_TAG_DATA'
  | 'TRANSPORT_FAILURE'
  | 'CHECK_IN_PROGRESS'
  | 'NOTIFY_FAILURE';

// Failures of a single check; everything else is a usage error
const RECOVERABLE_CODES: ReadonlySet<UpdateCheckerErrorCode> = new Set<UpdateCheckerErrorCode>([
  'REPOSITORY_NOT_FOUND',
  'MISSING_TAG_DATA',
  'TRANSPORT_FAILURE',
  'CHECK_IN_PROGRESS',
]);

export class UpdateCheckerError extends Error {
  readonly code: UpdateCheckerErrorCode;

  constructor(code: UpdateCheckerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpdateCheckerError';
    this.code = code;
  }

  /**
   * True for failures of a network check that may succeed on a later attempt
   */
  get recoverable(): boolean {
    return RECOVERABLE_CODES.has(this.code);
  }
}

export const isUpdateCheckerError = (error: unknown): error is UpdateCheckerError => {
  return error instanceof UpdateCheckerError;
};
