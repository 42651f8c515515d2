import type { SourceFormat } from '../types/track'

export type DatasetErrorKind = 'data-unavailable' | 'schema-invalid' | 'malformed-link'

export interface SourceAttempt {
  location: string
  format: SourceFormat
  reason: string
}

export type DatasetErrorOptions = {
  attempted?: SourceAttempt[]
  missingColumns?: string[]
  link?: string
  cause?: unknown
}

export class DatasetError extends Error {
  readonly kind: DatasetErrorKind
  readonly attempted: SourceAttempt[]
  readonly missingColumns: string[]
  readonly link?: string
  readonly cause?: unknown

  constructor(kind: DatasetErrorKind, message: string, options: DatasetErrorOptions = {}) {
    super(message)
    this.name = 'DatasetError'
    this.kind = kind
    this.attempted = options.attempted ?? []
    this.missingColumns = options.missingColumns ?? []
    this.link = options.link
    this.cause = options.cause

    if (options.cause) {
      Error.captureStackTrace(this, DatasetError)
    }
  }
}

export function isDatasetError(error: unknown, kind?: DatasetErrorKind): error is DatasetError {
  if (!(error instanceof DatasetError)) return false
  return kind === undefined || error.kind === kind
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name
  return typeof error === 'string' ? error : 'unknown error'
}

export function mapDatasetErrorToMessage(error: unknown): string {
  if (!isDatasetError(error)) {
    return 'Something went wrong while preparing the dataset.'
  }

  switch (error.kind) {
    case 'data-unavailable': {
      const tried = error.attempted.map((attempt) => attempt.location)
      return tried.length > 0
        ? `No loadable data found. Tried: ${tried.join(', ')}.`
        : 'No loadable data found.'
    }
    case 'schema-invalid':
      return `The dataset is missing required columns: ${error.missingColumns.join(', ')}.`
    case 'malformed-link':
      return 'Player unavailable for this track.'
    default:
      return 'Something went wrong while preparing the dataset.'
  }
}
