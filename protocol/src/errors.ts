export type ArchiveErrorCode =
  | 'BadMagic'
  | 'UnsupportedVersion'
  | 'CorruptHeader'
  | 'CorruptSlot'
  | 'IntegrityMismatch'
  | 'UnexpectedEof'
  | 'NotFound'
  | 'AlreadyExists'
  | 'ReadOnly'
  | 'CompressionFailed'
  | 'InvalidName'
  | 'EntryTooLarge'
  | 'IndexFull'
  | 'ConcurrentModification'
  | 'Closed';

export interface ArchiveErrorOptions {
  entryName?: string;
  offset?: number;
  cause?: unknown;
}

/**
 * Error raised for decode failures and rejected archive operations.
 * IO failures of the backing store are never wrapped in this type.
 */
export class ArchiveError extends Error {
  readonly code: ArchiveErrorCode;
  readonly entryName?: string;
  readonly offset?: number;

  constructor(code: ArchiveErrorCode, message: string, options: ArchiveErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ArchiveError';
    this.code = code;
    this.entryName = options.entryName;
    this.offset = options.offset;
  }
}

export function isArchiveError(error: unknown, code?: ArchiveErrorCode): error is ArchiveError {
  if (!(error instanceof ArchiveError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

export function notFound(name: string): ArchiveError {
  return new ArchiveError('NotFound', `Entry '${name}' does not exist`, { entryName: name });
}

export function alreadyExists(name: string): ArchiveError {
  return new ArchiveError('AlreadyExists', `Entry '${name}' already exists`, { entryName: name });
}
