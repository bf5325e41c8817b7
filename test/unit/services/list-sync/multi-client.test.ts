import { InvalidSnapshotError } from '@root/types/errors.js'
import type { SyncListItem } from '@root/types/list-sync.types.js'
import { applyChangesFromMultipleClients } from '@services/list-sync/reconciliation/index.js'
import { validateItems } from '@services/list-sync/validation/list-validator.js'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  BASE_TIME,
  buildList,
  createMapping,
  createTestDeps,
  describeOrder,
  minutesAfterBase,
  syncItem,
} from '../../../helpers/lists.js'

const NOW = minutesAfterBase(30)

describe('applyChangesFromMultipleClients', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(NOW)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('should apply the most recent entry per item and insert new items', async () => {
    const list = buildList([1, 2, 3])
    const changes = new Map<number, SyncListItem[]>([
      [5, [syncItem('ext-2', 0, minutesAfterBase(10))]],
      [
        3,
        [
          syncItem('ext-2', 2, minutesAfterBase(5)),
          syncItem('ext-4', 3, minutesAfterBase(1)),
        ],
      ],
    ])

    const result = await applyChangesFromMultipleClients(
      list,
      changes,
      createMapping([1, 2, 3, 4]),
      'plex',
      createTestDeps(),
    )

    expect(result).toEqual({
      added: 1,
      updated: 1,
      removed: 0,
      dropped: [],
      changed: true,
    })
    expect(describeOrder(list)).toEqual([
      [2, 0],
      [1, 1],
      [3, 2],
      [4, 3],
    ])
    expect(list.itemCount).toBe(4)
    expect(list.lastModified).toEqual(NOW)
    expect(list.modifiedBy).toBe(5)
    expect(list.items[0].lastChanged).toEqual(minutesAfterBase(10))
    expect(list.items[3].changeHistory).toEqual([
      { actorId: 3, kind: 'add', timestamp: NOW },
    ])
    expect(validateItems(list)).toEqual([])
  })

  it('should break identical timestamps in favour of the lower client id', async () => {
    const at = minutesAfterBase(5)
    const fromHigh = [syncItem('ext-1', 2, at)]
    const fromLow = [syncItem('ext-1', 1, at)]

    const first = buildList([1, 2, 3])
    await applyChangesFromMultipleClients(
      first,
      new Map([
        [8, fromHigh],
        [4, fromLow],
      ]),
      createMapping([1, 2, 3]),
      'plex',
      createTestDeps(),
    )

    const second = buildList([1, 2, 3])
    await applyChangesFromMultipleClients(
      second,
      new Map([
        [4, fromLow],
        [8, fromHigh],
      ]),
      createMapping([1, 2, 3]),
      'plex',
      createTestDeps(),
    )

    expect(describeOrder(first)).toEqual([
      [2, 0],
      [1, 1],
      [3, 2],
    ])
    expect(describeOrder(second)).toEqual(describeOrder(first))
    expect(first.modifiedBy).toBe(4)
  })

  it('should never remove items a client did not report', async () => {
    const list = buildList([1, 2, 3])

    const result = await applyChangesFromMultipleClients(
      list,
      new Map([[4, [syncItem('ext-1', 0, BASE_TIME)]]]),
      createMapping([1, 2, 3]),
      'plex',
      createTestDeps(),
    )

    expect(result.removed).toBe(0)
    expect(result.changed).toBe(false)
    expect(list.itemCount).toBe(3)
    expect(list.lastModified).toEqual(BASE_TIME)
  })

  it('should collect dropped ids and replace every client state', async () => {
    const list = buildList([1])
    const fromTwo = [syncItem('unknown', 0, BASE_TIME)]
    const fromSix = [syncItem('ext-1', 0, BASE_TIME)]

    const result = await applyChangesFromMultipleClients(
      list,
      new Map([
        [6, fromSix],
        [2, fromTwo],
      ]),
      createMapping([1]),
      'plex',
      createTestDeps(),
    )

    expect(result.dropped).toEqual(['unknown'])
    expect(list.syncStates.get(2)?.items).toEqual(fromTwo)
    expect(list.syncStates.get(6)?.items).toEqual(fromSix)
    expect(list.syncStates.get(6)?.lastSyncedAt).toEqual(NOW)
    expect(list.lastSynced).toEqual(NOW)
  })

  it('should reject the pass when any client reports an unstorable item', async () => {
    const list = buildList([1, 2])
    const before = structuredClone(list)

    const error = await applyChangesFromMultipleClients(
      list,
      new Map([
        [2, [syncItem('ext-2', 0, minutesAfterBase(5))]],
        [6, [syncItem('ext-1', 0, new Date('not a date'))]],
      ]),
      createMapping([1, 2]),
      'plex',
      createTestDeps(),
    ).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(InvalidSnapshotError)
    expect(error).toMatchObject({ code: 'INVALID_SNAPSHOT', clientId: 6 })
    expect(list).toEqual(before)
  })
})
