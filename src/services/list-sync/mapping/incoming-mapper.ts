/**
 * Incoming Item Mapper
 *
 * Translates a client's reported items from native ids to internal ids.
 * Items without a mapping are dropped from the batch instead of failing it,
 * since a client's list may hold items this library does not know about.
 */

import { MappingError } from '@root/types/errors.js'
import type {
  IdMappingService,
  ListSyncDeps,
  MappedIncomingBatch,
  MappedIncomingItem,
  MediaClientType,
  SyncListItem,
} from '@root/types/list-sync.types.js'
import pLimit from 'p-limit'

/**
 * Maps one client's snapshot to internal ids.
 *
 * @param clientId - Client that reported the items
 * @param incoming - The client's snapshot
 * @param mappingService - Id translation collaborator
 * @param serviceKind - Which client id space the native ids belong to
 * @param deps - Logger and settings
 * @returns Translated entries in incoming order, plus the native ids that were dropped
 * @throws Any non-mapping error raised by the mapping service
 */
export async function mapIncomingItems(
  clientId: number,
  incoming: SyncListItem[],
  mappingService: IdMappingService,
  serviceKind: MediaClientType,
  deps: ListSyncDeps,
): Promise<MappedIncomingBatch> {
  const limit = pLimit(Math.max(1, deps.config.mappingConcurrency))

  let results: Array<MappedIncomingItem | null>
  try {
    results = await Promise.all(
      incoming.map((source) =>
        limit(async (): Promise<MappedIncomingItem | null> => {
          try {
            const itemId = await mappingService.externalToInternal(
              source.externalItemId,
              serviceKind,
            )
            return { itemId, clientId, source }
          } catch (error) {
            if (error instanceof MappingError) {
              deps.logger.debug(
                {
                  clientId,
                  serviceKind,
                  externalItemId: source.externalItemId,
                },
                'Dropping incoming item without internal mapping',
              )
              return null
            }
            throw error
          }
        }),
      ),
    )
  } catch (error) {
    // Lookups still queued must not run once the batch has failed
    limit.clearQueue()
    throw error
  }

  const items: MappedIncomingItem[] = []
  const dropped: string[] = []
  results.forEach((result, index) => {
    if (result) {
      items.push(result)
    } else {
      dropped.push(incoming[index].externalItemId)
    }
  })

  if (dropped.length > 0) {
    deps.logger.info(
      { clientId, serviceKind, droppedCount: dropped.length },
      'Some incoming items could not be mapped and were skipped',
    )
  }

  return { items, dropped }
}
