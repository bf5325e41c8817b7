/**
 * Client State Module
 *
 * Bookkeeping for the per-client snapshots a list keeps: what each external
 * client last reported or was last sent, and whether the pair has diverged.
 */

import { SyncListItemSchema } from '@schemas/list-sync/ordered-list.schema.js'
import { InvalidSnapshotError } from '@root/types/errors.js'
import type {
  ClientSyncStatus,
  OrderedList,
  SyncClientState,
  SyncListItem,
} from '@root/types/list-sync.types.js'
import { cloneChangeHistory } from '../history/change-history.js'

export function getClientState(
  list: OrderedList,
  clientId: number,
): SyncClientState | undefined {
  return list.syncStates.get(clientId)
}

export function cloneSyncItems(items: SyncListItem[]): SyncListItem[] {
  return items.map((item) => ({
    externalItemId: item.externalItemId,
    position: item.position,
    lastChanged: new Date(item.lastChanged.getTime()),
    changeHistory: cloneChangeHistory(item.changeHistory),
  }))
}

/**
 * Checks a client's reported items against the stored snapshot shape and
 * returns validated copies.
 *
 * @throws InvalidSnapshotError when an item could not be stored
 */
export function parseSyncSnapshot(
  clientId: number,
  items: SyncListItem[],
): SyncListItem[] {
  if (!Number.isInteger(clientId) || clientId < 0) {
    throw new InvalidSnapshotError(clientId, [
      'clientId: must be a non-negative integer',
    ])
  }
  const result = SyncListItemSchema.array().safeParse(items)
  if (!result.success) {
    throw new InvalidSnapshotError(
      clientId,
      result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    )
  }
  return result.data
}

/**
 * Replaces the stored snapshot for a client, creating the state on first use.
 * An existing external list id is kept unless a new one is given.
 */
export function replaceClientState(
  list: OrderedList,
  clientId: number,
  items: SyncListItem[],
  syncedAt: Date,
  externalListId?: string,
): SyncClientState {
  const previous = list.syncStates.get(clientId)
  const state: SyncClientState = {
    clientId,
    externalListId: externalListId ?? previous?.externalListId ?? '',
    items: cloneSyncItems(items),
    lastSyncedAt: syncedAt,
  }
  list.syncStates.set(clientId, state)
  return state
}

/**
 * Discards a client's state. The only way a (list, client) pair leaves the
 * sync lifecycle.
 *
 * @returns Whether the client had any state
 */
export function unlinkClient(list: OrderedList, clientId: number): boolean {
  return list.syncStates.delete(clientId)
}

/**
 * Where the (list, client) pair sits in its lifecycle: no baseline yet,
 * in step with the last exchange, or modified locally since then.
 */
export function getClientSyncStatus(
  list: OrderedList,
  clientId: number,
): ClientSyncStatus {
  const state = list.syncStates.get(clientId)
  if (!state) {
    return 'unsynced'
  }
  return list.lastModified.getTime() > state.lastSyncedAt.getTime()
    ? 'diverged'
    : 'synced'
}
