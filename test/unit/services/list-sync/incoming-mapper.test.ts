import { MappingError } from '@root/types/errors.js'
import type {
  IdMappingService,
  MediaClientType,
} from '@root/types/list-sync.types.js'
import { mapIncomingItems } from '@services/list-sync/mapping/incoming-mapper.js'
import { describe, expect, it } from 'vitest'
import {
  BASE_TIME,
  createMapping,
  createTestDeps,
  syncItem,
} from '../../../helpers/lists.js'

describe('mapIncomingItems', () => {
  it('should translate native ids and keep incoming order', async () => {
    const deps = createTestDeps()
    const incoming = [
      syncItem('ext-3', 0, BASE_TIME),
      syncItem('ext-1', 1, BASE_TIME),
    ]

    const batch = await mapIncomingItems(
      6,
      incoming,
      createMapping([1, 3]),
      'plex',
      deps,
    )

    expect(batch.dropped).toEqual([])
    expect(batch.items).toEqual([
      { itemId: 3, clientId: 6, source: incoming[0] },
      { itemId: 1, clientId: 6, source: incoming[1] },
    ])
    expect(deps.logger.info).not.toHaveBeenCalled()
  })

  it('should drop items without a mapping and report their ids', async () => {
    const deps = createTestDeps()

    const batch = await mapIncomingItems(
      6,
      [
        syncItem('ext-1', 0, BASE_TIME),
        syncItem('unknown-a', 1, BASE_TIME),
        syncItem('unknown-b', 2, BASE_TIME),
      ],
      createMapping([1]),
      'plex',
      deps,
    )

    expect(batch.items.map((item) => item.itemId)).toEqual([1])
    expect(batch.dropped).toEqual(['unknown-a', 'unknown-b'])
    expect(deps.logger.info).toHaveBeenCalledWith(
      { clientId: 6, serviceKind: 'plex', droppedCount: 2 },
      'Some incoming items could not be mapped and were skipped',
    )
  })

  it('should propagate errors other than MappingError', async () => {
    const failing: IdMappingService = {
      externalToInternal: async () => {
        throw new Error('mapping store unavailable')
      },
      internalToExternal: async (internalId, serviceKind) => {
        throw new MappingError(internalId, serviceKind, 'toExternal')
      },
    }

    await expect(
      mapIncomingItems(
        6,
        [syncItem('ext-1', 0, BASE_TIME)],
        failing,
        'plex',
        createTestDeps(),
      ),
    ).rejects.toThrow('mapping store unavailable')
  })

  it('should bound concurrent lookups by mappingConcurrency', async () => {
    let active = 0
    let maxActive = 0
    const slow: IdMappingService = {
      externalToInternal: async (
        externalId: string,
        _serviceKind: MediaClientType,
      ) => {
        active++
        maxActive = Math.max(maxActive, active)
        await new Promise((resolve) => setImmediate(resolve))
        active--
        return Number(externalId.replace('ext-', ''))
      },
      internalToExternal: async (internalId) => `ext-${internalId}`,
    }

    const batch = await mapIncomingItems(
      6,
      [1, 2, 3, 4, 5].map((id) => syncItem(`ext-${id}`, id - 1, BASE_TIME)),
      slow,
      'plex',
      createTestDeps({ mappingConcurrency: 2 }),
    )

    expect(batch.items.map((item) => item.itemId)).toEqual([1, 2, 3, 4, 5])
    expect(maxActive).toBe(2)
  })

  it('should stop queued lookups once the batch fails', async () => {
    const calls: string[] = []
    let release = () => {}
    const gate = new Promise<void>((resolve) => {
      release = () => resolve()
    })
    const failing: IdMappingService = {
      externalToInternal: async (externalId) => {
        calls.push(externalId)
        if (externalId === 'ext-1') {
          throw new Error('mapping store unavailable')
        }
        await gate
        return Number(externalId.replace('ext-', ''))
      },
      internalToExternal: async (internalId) => `ext-${internalId}`,
    }

    await expect(
      mapIncomingItems(
        6,
        [1, 2, 3, 4, 5].map((id) => syncItem(`ext-${id}`, id - 1, BASE_TIME)),
        failing,
        'plex',
        createTestDeps({ mappingConcurrency: 1 }),
      ),
    ).rejects.toThrow('mapping store unavailable')

    release()
    await new Promise((resolve) => setImmediate(resolve))

    // At most the lookup already in flight ran after the failure
    expect([['ext-1'], ['ext-1', 'ext-2']]).toContainEqual(calls)
  })
})
