import {
  deserializeOrderedList,
  serializeOrderedList,
} from '@services/list-sync/persistence/list-serde.js'
import { replaceClientState } from '@services/list-sync/client-state/client-state.js'
import { describe, expect, it } from 'vitest'
import { ZodError } from 'zod'
import {
  BASE_TIME,
  buildList,
  minutesAfterBase,
  syncItem,
} from '../../../helpers/lists.js'

describe('list-serde', () => {
  it('should restore an empty list', () => {
    const list = buildList([])

    expect(deserializeOrderedList(serializeOrderedList(list))).toEqual(list)
  })

  it('should restore items, history, client states and dates', () => {
    const list = buildList([4, 5], BASE_TIME, {
      listType: 'collection',
      description: 'Weekend picks',
      isPublic: true,
      sharedWith: [8, 9],
      originClientId: 3,
    })
    list.items[0].changeHistory.push({
      actorId: 3,
      kind: 'add',
      timestamp: minutesAfterBase(1),
    })
    replaceClientState(
      list,
      3,
      [syncItem('jf-4', 0, BASE_TIME)],
      minutesAfterBase(2),
      'jf-list',
    )
    list.lastSynced = minutesAfterBase(2)

    const restored = deserializeOrderedList(serializeOrderedList(list))

    expect(restored).toEqual(list)
    expect(restored.syncStates).toBeInstanceOf(Map)
    expect(restored.items[0].changeHistory[0].timestamp).toBeInstanceOf(Date)
  })

  it('should store client states as an array', () => {
    const list = buildList([1])
    replaceClientState(list, 3, [], BASE_TIME)

    const doc = JSON.parse(serializeOrderedList(list))

    expect(doc.syncStates).toEqual([
      {
        clientId: 3,
        externalListId: '',
        items: [],
        lastSyncedAt: BASE_TIME.toISOString(),
      },
    ])
  })

  it('should reject a document with two states for one client', () => {
    const list = buildList([1])
    replaceClientState(list, 3, [], BASE_TIME)
    const doc = JSON.parse(serializeOrderedList(list))
    doc.syncStates.push(doc.syncStates[0])

    expect(() => deserializeOrderedList(JSON.stringify(doc))).toThrow(
      'Duplicate sync state for client 3',
    )
  })

  it('should reject a document of the wrong shape', () => {
    expect(() =>
      deserializeOrderedList(JSON.stringify({ id: 1, items: 'none' })),
    ).toThrow(ZodError)
  })

  it('should reject malformed JSON', () => {
    expect(() => deserializeOrderedList('{not json')).toThrow(SyntaxError)
  })
})
