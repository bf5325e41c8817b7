/**
 * Single-Client Reconciliation
 *
 * Merges one client's snapshot into the canonical list with item-level
 * last-writer-wins, removes items the client no longer reports and records
 * the snapshot as the client's new state.
 */

import type {
  IdMappingService,
  ListSyncDeps,
  MediaClientType,
  OrderedList,
  ReconciliationResult,
  SyncListItem,
} from '@root/types/list-sync.types.js'
import {
  parseSyncSnapshot,
  replaceClientState,
} from '../client-state/client-state.js'
import { mapIncomingItems } from '../mapping/incoming-mapper.js'
import { applyEntries, settlePositions } from './entry-applier.js'
import { selectWinningEntries } from './winner-selection.js'

/**
 * Reconciles a client's current view of the list into the canonical list.
 *
 * An empty translated snapshot is read as "nothing to report" and removes
 * nothing. Applying the same snapshot twice changes nothing the second time.
 *
 * @param list - Canonical list, modified in place
 * @param clientId - Client that reported the snapshot
 * @param incomingItems - The client's items with native ids
 * @param mappingService - Id translation collaborator
 * @param serviceKind - Id space of the native ids
 * @param deps - Logger and settings
 * @param externalListId - The list's id on the client, when known
 * @returns Counts of what changed and the native ids that were dropped
 * @throws InvalidSnapshotError when the snapshot holds items that cannot be stored
 */
export async function applyClientChanges(
  list: OrderedList,
  clientId: number,
  incomingItems: SyncListItem[],
  mappingService: IdMappingService,
  serviceKind: MediaClientType,
  deps: ListSyncDeps,
  externalListId?: string,
): Promise<ReconciliationResult> {
  const historyLimit = deps.config.changeHistoryLimit
  const snapshot = parseSyncSnapshot(clientId, incomingItems)

  const batch = await mapIncomingItems(
    clientId,
    snapshot,
    mappingService,
    serviceKind,
    deps,
  )
  const entries = selectWinningEntries(batch.items)

  const outcome = applyEntries(list, entries, historyLimit)

  let removed = 0
  if (entries.length > 0) {
    const reported = new Set(entries.map((entry) => entry.itemId))
    const before = list.items.length
    list.items = list.items.filter((item) => reported.has(item.itemId))
    removed = before - list.items.length
  }

  settlePositions(list, outcome.ranks)

  const now = new Date()
  replaceClientState(list, clientId, snapshot, now, externalListId)
  list.lastSynced = now

  const changed = outcome.added + outcome.updated + removed > 0
  if (changed) {
    list.lastModified = now
    list.modifiedBy = clientId
  }

  deps.logger.debug(
    {
      listId: list.id,
      clientId,
      serviceKind,
      added: outcome.added,
      updated: outcome.updated,
      removed,
      dropped: batch.dropped.length,
    },
    'Applied client changes to list',
  )

  return {
    added: outcome.added,
    updated: outcome.updated,
    removed,
    dropped: batch.dropped,
    changed,
  }
}
