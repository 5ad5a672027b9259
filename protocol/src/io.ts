import { ArchiveError } from './errors';

export interface SizeRequest {
  kind: 'size';
}

/** Exactly `length` bytes at an absolute offset. */
export interface ReadRequest {
  kind: 'read';
  offset: number;
  length: number;
}

/** At least `minLength`, at most `maxLength` bytes from where the previous read stopped. */
export interface ReadMoreRequest {
  kind: 'readMore';
  minLength: number;
  maxLength: number;
}

export interface WriteRequest {
  kind: 'write';
  offset: number;
  data: Buffer;
}

export interface TruncateRequest {
  kind: 'truncate';
  length: number;
}

export interface SyncRequest {
  kind: 'sync';
}

export type ReadSeekRequest = SizeRequest | ReadRequest | ReadMoreRequest;
export type MutationRequest = WriteRequest | TruncateRequest | SyncRequest;
export type IoRequest = ReadSeekRequest | MutationRequest;
export type IoRequestKind = IoRequest['kind'];

export interface SizeResponse {
  kind: 'size';
  size: number;
}

export interface DataResponse {
  kind: 'data';
  data: Buffer;
}

/** The source ran dry before the request was satisfied; `data` holds what was read. */
export interface EofResponse {
  kind: 'eof';
  data: Buffer;
  wanted: number;
}

export interface AckResponse {
  kind: 'ack';
}

export type ReadResponse = DataResponse | EofResponse;
export type IoResponse = SizeResponse | ReadResponse | AckResponse;

export type IoResponseFor = {
  size: SizeResponse;
  read: ReadResponse;
  readMore: ReadResponse;
  write: AckResponse;
  truncate: AckResponse;
  sync: AckResponse;
};

export type IoRequestHandler<TKind extends IoRequestKind, TResult> = (
  request: Extract<IoRequest, { kind: TKind }>
) => TResult;

export type SyncRequestHandlers<TKinds extends IoRequestKind> = {
  [K in TKinds]: IoRequestHandler<K, IoResponseFor[K]>;
};

export type AsyncRequestHandlers<TKinds extends IoRequestKind> = {
  [K in TKinds]: IoRequestHandler<K, Promise<IoResponseFor[K]>>;
};

export type Step<TValue, TRequest extends IoRequest = IoRequest> =
  | { status: 'need'; request: TRequest }
  | { status: 'done'; value: TValue }
  | { status: 'failed'; error: ArchiveError };

/**
 * A computation that never performs IO itself. It either finishes, fails, or
 * suspends with a request; the driver answers through `feed` and the
 * computation continues from exactly where it stopped.
 */
export interface Resumable<TValue, TRequest extends IoRequest = IoRequest> {
  start(): Step<TValue, TRequest>;
  feed(response: IoResponse): Step<TValue, TRequest>;
}
