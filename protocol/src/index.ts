export {
  ArchiveError,
  isArchiveError,
  notFound,
  alreadyExists,
} from './errors';
export type { ArchiveErrorCode, ArchiveErrorOptions } from './errors';

export {
  MAGIC,
  FORMAT_VERSION,
  HEADER_SIZE,
  SLOT_SIZE,
  INDEX_OFFSET,
  SLOT_NAME_OFFSET,
  MAX_NAME_BYTES,
  MAX_ENTRY_BYTES,
  SlotState,
  EntryFlags,
  EMPTY_SLOT,
  TOMBSTONE_SLOT,
  dataStartFor,
  slotPosition,
  nameHash,
  validateEntryName,
  encodeHeader,
  decodeHeader,
  encodeSlot,
  decodeSlot,
  emptySlotBytes,
} from './format';
export type { ArchiveHeader, EntryDescriptor, IndexSlot, OccupiedSlot } from './format';

export type {
  SizeRequest,
  ReadRequest,
  ReadMoreRequest,
  WriteRequest,
  TruncateRequest,
  SyncRequest,
  ReadSeekRequest,
  MutationRequest,
  IoRequest,
  IoRequestKind,
  SizeResponse,
  DataResponse,
  EofResponse,
  AckResponse,
  ReadResponse,
  IoResponse,
  IoResponseFor,
  IoRequestHandler,
  SyncRequestHandlers,
  AsyncRequestHandlers,
  Step,
  Resumable,
} from './io';
