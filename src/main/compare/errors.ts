export type InvalidPathReason = 'missing' | 'not_directory';

export class InvalidPathError extends Error {
  readonly code = 'INVALID_PATH';

  constructor(
    readonly path: string,
    readonly reason: InvalidPathReason,
  ) {
    super(
      reason === 'missing'
        ? `Path does not exist: ${path}`
        : `Path is not a directory: ${path}`,
    );
    this.name = 'InvalidPathError';
  }
}

export class ComparisonCancelledError extends Error {
  readonly code = 'COMPARISON_CANCELLED';

  constructor(message = 'Comparison was cancelled') {
    super(message);
    this.name = 'ComparisonCancelledError';
  }
}

export const throwIfCancelled = (signal?: AbortSignal) => {
  if (signal?.aborted) {
    throw new ComparisonCancelledError();
  }
};
