/**
 * Entry Applier
 *
 * Shared steps of single- and multi-client reconciliation: applying a
 * winning entry to the canonical list and settling positions afterwards.
 */

import type {
  ListItem,
  MappedIncomingItem,
  OrderedList,
} from '@root/types/list-sync.types.js'
import { appendChangeRecord } from '../history/change-history.js'
import {
  addItem,
  findItemById,
  normalizePositions,
} from '../positions/index.js'

/**
 * How an updated item is ordered against an untouched item that ends up on
 * the same position. An item that moved toward the front lands before the
 * occupant, one that moved toward the back lands after it, matching what a
 * reorder on the client would have produced.
 */
export type ContestRank = 'before' | 'after'

export interface ApplyEntriesOutcome {
  added: number
  updated: number
  /** Rank of every item updated in this pass */
  ranks: Map<number, ContestRank>
  /** Latest applied entry, used to attribute the change */
  latest: MappedIncomingItem | null
}

/**
 * Applies an entry to an existing canonical item when the entry is strictly
 * newer. Returns the contest rank when applied, null otherwise.
 */
export function applyNewerEntry(
  existing: ListItem,
  entry: MappedIncomingItem,
  historyLimit: number,
): ContestRank | null {
  const incomingTime = entry.source.lastChanged.getTime()
  if (incomingTime <= existing.lastChanged.getTime()) {
    return null
  }

  const oldPosition = existing.position
  existing.position = entry.source.position
  existing.lastChanged = new Date(incomingTime)
  appendChangeRecord(
    existing,
    entry.clientId,
    'update',
    new Date(),
    historyLimit,
  )

  return existing.position > oldPosition ? 'after' : 'before'
}

/**
 * Applies winning entries: newer entries update existing items, entries for
 * unknown items are inserted at their reported position. Updates run before
 * inserts, and inserts run in ascending reported position, so each insert
 * lands in the client's coordinate space.
 */
export function applyEntries(
  list: OrderedList,
  entries: MappedIncomingItem[],
  historyLimit: number,
): ApplyEntriesOutcome {
  const outcome: ApplyEntriesOutcome = {
    added: 0,
    updated: 0,
    ranks: new Map(),
    latest: null,
  }
  const absent: MappedIncomingItem[] = []

  const noteApplied = (entry: MappedIncomingItem) => {
    if (
      !outcome.latest ||
      entry.source.lastChanged.getTime() >
        outcome.latest.source.lastChanged.getTime()
    ) {
      outcome.latest = entry
    }
  }

  for (const entry of entries) {
    const existing = findItemById(list, entry.itemId)
    if (!existing) {
      absent.push(entry)
      continue
    }

    const rank = applyNewerEntry(existing, entry, historyLimit)
    if (rank) {
      outcome.ranks.set(existing.itemId, rank)
      outcome.updated++
      noteApplied(entry)
    }
  }

  absent.sort((a, b) => a.source.position - b.source.position)
  for (const entry of absent) {
    addItem(
      list,
      {
        itemId: entry.itemId,
        position: entry.source.position,
        lastChanged: new Date(entry.source.lastChanged.getTime()),
      },
      entry.clientId,
      historyLimit,
    )
    outcome.added++
    noteApplied(entry)
  }

  return outcome
}

/**
 * Resolves positions shared by several items using their contest rank, then
 * renormalizes to 0..n-1 and refreshes the item count.
 */
export function settlePositions(
  list: OrderedList,
  ranks: Map<number, ContestRank>,
): void {
  const weight = (item: ListItem) => {
    const rank = ranks.get(item.itemId)
    return rank === 'before' ? 0 : rank === 'after' ? 2 : 1
  }

  list.items.sort(
    (a, b) => a.position - b.position || weight(a) - weight(b),
  )
  normalizePositions(list)
  list.itemCount = list.items.length
}
