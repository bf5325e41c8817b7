import {
  DuplicateItemError,
  InvalidSnapshotError,
  InvariantViolationError,
  ItemNotFoundError,
  ListNotFoundError,
  ListSyncError,
  MappingError,
  NoClientStateError,
} from '@root/types/errors.js'
import { describe, expect, it } from 'vitest'

const cases: Array<[ListSyncError, string, string]> = [
  [new ItemNotFoundError(4), 'ITEM_NOT_FOUND', 'Item 4 not found'],
  [
    new DuplicateItemError(4),
    'DUPLICATE_ITEM',
    'Item 4 is already in the list',
  ],
  [
    new MappingError('rk-1', 'plex', 'toInternal'),
    'MAPPING_ERROR',
    'No internal mapping for plex item rk-1',
  ],
  [
    new NoClientStateError(2, 5),
    'NO_CLIENT_STATE',
    'List 2 has no sync state for client 5',
  ],
  [new ListNotFoundError(2), 'LIST_NOT_FOUND', 'List 2 not found'],
  [
    new InvalidSnapshotError(5, ['0.position: Expected number, received nan']),
    'INVALID_SNAPSHOT',
    'Snapshot from client 5 is invalid: 0.position: Expected number, received nan',
  ],
]

describe('list sync errors', () => {
  it.each(cases)('%s should carry code %s', (error, code, message) => {
    expect(error).toBeInstanceOf(ListSyncError)
    expect(error).toBeInstanceOf(Error)
    expect(error.code).toBe(code)
    expect(error.message).toBe(message)
  })

  it('should keep the subclass name and prototype', () => {
    const error = new ItemNotFoundError(4)

    expect(error.name).toBe('ItemNotFoundError')
    expect(error).toBeInstanceOf(ItemNotFoundError)
    expect(error.itemId).toBe(4)
  })

  it('should join violation messages', () => {
    const error = new InvariantViolationError(3, [
      { kind: 'missing-position', message: 'missing position: 1' },
      { kind: 'duplicate-item-id', message: 'duplicate item id: 7' },
    ])

    expect(error.message).toBe(
      'List 3 failed validation: missing position: 1; duplicate item id: 7',
    )
    expect(error.violations).toHaveLength(2)
  })

  it('should keep a cause', () => {
    const cause = new Error('lookup failed')
    const error = new MappingError(3, 'emby', 'toExternal', { cause })

    expect(error.cause).toBe(cause)
  })
})
