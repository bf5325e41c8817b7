/**
 * Change History Module
 *
 * Appends audit records to list items and keeps each item's history bounded.
 */

import type {
  ChangeKind,
  ChangeRecord,
  ListItem,
} from '@root/types/list-sync.types.js'

export const DEFAULT_CHANGE_HISTORY_LIMIT = 50

/**
 * Appends a change record to an item, dropping the oldest records once the
 * history exceeds `limit`.
 *
 * Does not touch `lastChanged`; callers decide which timestamp an item carries.
 */
export function appendChangeRecord(
  item: ListItem,
  actorId: number,
  kind: ChangeKind,
  timestamp: Date,
  limit: number = DEFAULT_CHANGE_HISTORY_LIMIT,
): void {
  item.changeHistory.push({ actorId, kind, timestamp })
  trimChangeHistory(item.changeHistory, limit)
}

/**
 * Removes the oldest entries in place so at most `limit` remain.
 * A limit below 1 keeps only the latest record.
 */
export function trimChangeHistory(
  history: ChangeRecord[],
  limit: number,
): void {
  const keep = Math.max(1, Math.floor(limit))
  if (history.length > keep) {
    history.splice(0, history.length - keep)
  }
}

export function cloneChangeHistory(history: ChangeRecord[]): ChangeRecord[] {
  return history.map((record) => ({
    actorId: record.actorId,
    kind: record.kind,
    timestamp: new Date(record.timestamp.getTime()),
  }))
}
