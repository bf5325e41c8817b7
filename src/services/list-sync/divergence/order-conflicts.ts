import type {
  IdMappingService,
  ListSyncDeps,
  MediaClientType,
  OrderedList,
  SyncClientState,
} from '@root/types/list-sync.types.js'
import { mapIncomingItems } from '../mapping/incoming-mapper.js'

/**
 * Finds the client items whose reported position disagrees with the local
 * position of the same item. Items without a mapping, or not in the local
 * list, are not conflicts. Read only.
 *
 * @returns Native ids of the conflicting items; empty when aligned
 */
export async function detectItemOrderConflicts(
  list: OrderedList,
  clientState: SyncClientState,
  mappingService: IdMappingService,
  serviceKind: MediaClientType,
  deps: ListSyncDeps,
): Promise<Set<string>> {
  const localPositions = new Map<number, number>()
  for (const item of list.items) {
    localPositions.set(item.itemId, item.position)
  }

  const batch = await mapIncomingItems(
    clientState.clientId,
    clientState.items,
    mappingService,
    serviceKind,
    deps,
  )

  const conflicts = new Set<string>()
  for (const entry of batch.items) {
    const localPosition = localPositions.get(entry.itemId)
    if (localPosition !== undefined && localPosition !== entry.source.position) {
      conflicts.add(entry.source.externalItemId)
    }
  }

  return conflicts
}
