/**
 * Client Divergence Module
 *
 * Compares the canonical list with the snapshot stored for a client and
 * refreshes that snapshot when the two have drifted apart.
 */

import { NoClientStateError } from '@root/types/errors.js'
import type {
  IdMappingService,
  ListSyncDeps,
  MediaClientType,
  OrderedList,
  SyncListItem,
} from '@root/types/list-sync.types.js'
import { replaceClientState } from '../client-state/client-state.js'
import { buildSyncPayload } from '../export/payload-generator.js'

/**
 * Whether two snapshots differ in membership or in any item's position.
 * Timestamps and history are not compared.
 */
export function snapshotsDiffer(
  current: SyncListItem[],
  stored: SyncListItem[],
): boolean {
  if (current.length !== stored.length) {
    return true
  }

  const storedPositions = new Map<string, number>()
  for (const item of stored) {
    storedPositions.set(item.externalItemId, item.position)
  }

  return current.some(
    (item) => storedPositions.get(item.externalItemId) !== item.position,
  )
}

/**
 * Regenerates the export payload for a client and compares it with the
 * client's stored state. The stored items are replaced when they differ;
 * either way the pair counts as synced afterwards.
 *
 * @returns Whether the canonical list had diverged from the stored state
 * @throws NoClientStateError when the client has no baseline yet
 * @throws MappingError when any item has no mapping for the client
 */
export async function synchronizeWithClient(
  list: OrderedList,
  clientId: number,
  mappingService: IdMappingService,
  serviceKind: MediaClientType,
  deps: ListSyncDeps,
): Promise<boolean> {
  const state = list.syncStates.get(clientId)
  if (!state) {
    throw new NoClientStateError(list.id, clientId)
  }

  const payload = await buildSyncPayload(
    list,
    mappingService,
    serviceKind,
    deps,
  )
  const changed = snapshotsDiffer(payload, state.items)

  const now = new Date()
  if (changed) {
    replaceClientState(list, clientId, payload, now)
    list.lastSynced = now
    deps.logger.info(
      { listId: list.id, clientId, itemCount: payload.length },
      'List diverged from client state, refreshed stored snapshot',
    )
  } else {
    state.lastSyncedAt = now
  }

  return changed
}
