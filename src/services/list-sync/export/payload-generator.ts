/**
 * Sync Payload Generator
 *
 * Builds the view of a list that is sent to an external client, with every
 * item translated to the client's native id. Export is all or nothing: a
 * partial payload would leave the client with a different ordering.
 */

import type {
  IdMappingService,
  ListSyncDeps,
  MediaClientType,
  OrderedList,
  SyncListItem,
} from '@root/types/list-sync.types.js'
import pLimit from 'p-limit'
import { replaceClientState } from '../client-state/client-state.js'
import { cloneChangeHistory } from '../history/change-history.js'

/**
 * Translates every item of the list to the client's id space, in position
 * order. Read only.
 *
 * @throws MappingError when any item has no mapping for the client
 */
export async function buildSyncPayload(
  list: OrderedList,
  mappingService: IdMappingService,
  serviceKind: MediaClientType,
  deps: ListSyncDeps,
): Promise<SyncListItem[]> {
  const limit = pLimit(Math.max(1, deps.config.mappingConcurrency))
  const ordered = [...list.items].sort((a, b) => a.position - b.position)

  try {
    return await Promise.all(
      ordered.map((item) =>
        limit(async (): Promise<SyncListItem> => {
          const externalItemId = await mappingService.internalToExternal(
            item.itemId,
            serviceKind,
          )
          return {
            externalItemId,
            position: item.position,
            lastChanged: new Date(item.lastChanged.getTime()),
            changeHistory: cloneChangeHistory(item.changeHistory),
          }
        }),
      ),
    )
  } catch (error) {
    limit.clearQueue()
    throw error
  }
}

/**
 * Builds the export payload for a client and records it as the client's
 * baseline state. Nothing is recorded when translation fails.
 *
 * @param externalListId - The list's id on the client, when known
 * @returns The payload to send to the client
 * @throws MappingError when any item has no mapping for the client
 */
export async function generateSyncPayload(
  list: OrderedList,
  clientId: number,
  mappingService: IdMappingService,
  serviceKind: MediaClientType,
  deps: ListSyncDeps,
  externalListId?: string,
): Promise<SyncListItem[]> {
  let payload: SyncListItem[]
  try {
    payload = await buildSyncPayload(list, mappingService, serviceKind, deps)
  } catch (error) {
    deps.logger.warn(
      { listId: list.id, clientId, serviceKind, error },
      'Failed to build sync payload for client',
    )
    throw error
  }

  const now = new Date()
  replaceClientState(list, clientId, payload, now, externalListId)
  list.lastSynced = now

  deps.logger.debug(
    { listId: list.id, clientId, serviceKind, itemCount: payload.length },
    'Generated sync payload for client',
  )

  return payload
}
