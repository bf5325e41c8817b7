import type {
  InvariantViolation,
  MediaClientType,
} from '@root/types/list-sync.types.js'

export type ListSyncErrorCode =
  | 'ITEM_NOT_FOUND'
  | 'DUPLICATE_ITEM'
  | 'MAPPING_ERROR'
  | 'NO_CLIENT_STATE'
  | 'LIST_NOT_FOUND'
  | 'INVARIANT_VIOLATION'
  | 'INVALID_SNAPSHOT'

/**
 * Base class for errors raised by the list sync engine and its service.
 */
export class ListSyncError extends Error {
  constructor(
    message: string,
    public readonly code: ListSyncErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ListSyncError'

    // Fix prototype chain – important after TS → JS down-emit
    Object.setPrototypeOf(this, new.target.prototype)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

export class ItemNotFoundError extends ListSyncError {
  constructor(public readonly itemId: number) {
    super(`Item ${itemId} not found`, 'ITEM_NOT_FOUND')
    this.name = 'ItemNotFoundError'
  }
}

export class DuplicateItemError extends ListSyncError {
  constructor(public readonly itemId: number) {
    super(`Item ${itemId} is already in the list`, 'DUPLICATE_ITEM')
    this.name = 'DuplicateItemError'
  }
}

export class MappingError extends ListSyncError {
  constructor(
    public readonly id: string | number,
    public readonly serviceKind: MediaClientType,
    public readonly direction: 'toInternal' | 'toExternal',
    options?: { cause?: unknown },
  ) {
    super(
      direction === 'toInternal'
        ? `No internal mapping for ${serviceKind} item ${id}`
        : `No ${serviceKind} mapping for item ${id}`,
      'MAPPING_ERROR',
      options,
    )
    this.name = 'MappingError'
  }
}

export class NoClientStateError extends ListSyncError {
  constructor(
    public readonly listId: number,
    public readonly clientId: number,
  ) {
    super(
      `List ${listId} has no sync state for client ${clientId}`,
      'NO_CLIENT_STATE',
    )
    this.name = 'NoClientStateError'
  }
}

export class ListNotFoundError extends ListSyncError {
  constructor(public readonly listId: number) {
    super(`List ${listId} not found`, 'LIST_NOT_FOUND')
    this.name = 'ListNotFoundError'
  }
}

export class InvariantViolationError extends ListSyncError {
  constructor(
    public readonly listId: number,
    public readonly violations: InvariantViolation[],
  ) {
    super(
      `List ${listId} failed validation: ${violations
        .map((v) => v.message)
        .join('; ')}`,
      'INVARIANT_VIOLATION',
    )
    this.name = 'InvariantViolationError'
  }
}

export class InvalidSnapshotError extends ListSyncError {
  constructor(
    public readonly clientId: number,
    public readonly issues: string[],
  ) {
    super(
      `Snapshot from client ${clientId} is invalid: ${issues.join('; ')}`,
      'INVALID_SNAPSHOT',
    )
    this.name = 'InvalidSnapshotError'
  }
}
