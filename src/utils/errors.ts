export class ResolutionError extends Error {
  code = 'RESOLUTION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ResolutionError';
  }
}

export class NoLocationFoundError extends Error {
  code = 'NO_LOCATION_FOUND';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'NoLocationFoundError';
  }
}

export type AcquisitionErrorKind =
  | 'UnsupportedFormat'
  | 'DownloadFailed'
  | 'ExtractionFailed'
  | 'CheckoutFailed';

export class AcquisitionError extends Error {
  code = 'ACQUISITION_ERROR';
  constructor(public kind: AcquisitionErrorKind, message: string, public details?: unknown) {
    super(message);
    this.name = 'AcquisitionError';
  }
}

export class ParseError extends Error {
  code = 'PARSE_ERROR';
  constructor(
    message: string,
    public file: string,
    public line: number,
    public column: number,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

export class InputError extends Error {
  code = 'INPUT_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'InputError';
  }
}

/**
 * One-line cause for logs and summaries. Follows `details` one level down
 * when it holds the underlying error.
 */
export const describeError = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const details = 'details' in error ? error.details : undefined;
  if (details instanceof Error && details.message && details.message !== error.message) {
    return `${error.message}: ${details.message}`;
  }
  return error.message;
};
