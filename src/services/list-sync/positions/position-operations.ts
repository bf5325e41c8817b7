/**
 * Position Operations Module
 *
 * Positional edits on an ordered list. Every exported operation leaves the
 * list with unique, contiguous positions starting at 0 and an `itemCount`
 * equal to the number of items, and records who made the change.
 */

import {
  DuplicateItemError,
  ItemNotFoundError,
} from '@root/types/errors.js'
import type {
  ListItem,
  NewListItem,
  OrderedList,
} from '@root/types/list-sync.types.js'
import {
  appendChangeRecord,
  DEFAULT_CHANGE_HISTORY_LIMIT,
} from '../history/change-history.js'

/**
 * Sorts items by position in place. Array.prototype.sort is stable, so
 * items sharing a position keep their relative order.
 */
export function sortByPosition(items: ListItem[]): void {
  items.sort((a, b) => a.position - b.position)
}

/**
 * Stable-sorts the items by their current position and reassigns positions
 * 0..n-1. Run after any bulk mutation before relying on the invariants.
 */
export function normalizePositions(list: OrderedList): void {
  sortByPosition(list.items)
  list.items.forEach((item, index) => {
    item.position = index
  })
}

/**
 * Clamps a requested insert position to [0, count]; anything missing or
 * invalid appends.
 */
export function resolveInsertPosition(
  requested: number | undefined,
  count: number,
): number {
  if (
    requested === undefined ||
    !Number.isInteger(requested) ||
    requested < 0 ||
    requested > count
  ) {
    return count
  }
  return requested
}

/**
 * Stamps an item as changed at `now` without moving its timestamp backwards.
 * An item may carry a client-reported time ahead of the local clock.
 */
function stampChanged(item: ListItem, now: Date): void {
  if (item.lastChanged.getTime() < now.getTime()) {
    item.lastChanged = now
  }
}

function touchList(list: OrderedList, actorId: number, now: Date): void {
  list.itemCount = list.items.length
  list.lastModified = now
  list.modifiedBy = actorId
}

/**
 * Inserts an item, shifting every item at or after the insertion point.
 *
 * @param list - List to modify
 * @param item - Item id, requested position and optionally the timestamp the new item should carry
 * @param actorId - Client or user making the change
 * @param historyLimit - Maximum change records kept per item
 * @returns The inserted item
 * @throws DuplicateItemError when the item is already in the list
 */
export function addItem(
  list: OrderedList,
  item: NewListItem & { lastChanged?: Date },
  actorId: number,
  historyLimit: number = DEFAULT_CHANGE_HISTORY_LIMIT,
): ListItem {
  if (list.items.some((existing) => existing.itemId === item.itemId)) {
    throw new DuplicateItemError(item.itemId)
  }

  const now = new Date()
  const position = resolveInsertPosition(item.position, list.items.length)

  for (const existing of list.items) {
    if (existing.position >= position) {
      existing.position++
      stampChanged(existing, now)
    }
  }

  const added: ListItem = {
    itemId: item.itemId,
    position,
    lastChanged: item.lastChanged ?? now,
    changeHistory: [],
  }
  appendChangeRecord(added, actorId, 'add', now, historyLimit)

  list.items.push(added)
  sortByPosition(list.items)
  touchList(list, actorId, now)

  return added
}

/**
 * Removes an item and closes the gap it leaves.
 *
 * @returns The removed item, with a final `remove` record appended
 * @throws ItemNotFoundError when the item is not in the list
 */
export function removeItem(
  list: OrderedList,
  itemId: number,
  actorId: number,
  historyLimit: number = DEFAULT_CHANGE_HISTORY_LIMIT,
): ListItem {
  const index = list.items.findIndex((item) => item.itemId === itemId)
  if (index === -1) {
    throw new ItemNotFoundError(itemId)
  }

  const now = new Date()
  const [removed] = list.items.splice(index, 1)

  for (const item of list.items) {
    if (item.position > removed.position) {
      item.position--
      stampChanged(item, now)
      appendChangeRecord(item, actorId, 'reorder', now, historyLimit)
    }
  }

  appendChangeRecord(removed, actorId, 'remove', now, historyLimit)
  touchList(list, actorId, now)

  return removed
}

/**
 * Moves an item to a new position. Items between the old and new position
 * shift by one toward the vacated slot.
 *
 * @param newPosition - Target position, clamped to [0, count - 1]
 * @returns Whether the item moved
 * @throws ItemNotFoundError when the item is not in the list
 */
export function reorderItem(
  list: OrderedList,
  itemId: number,
  newPosition: number,
  actorId: number,
  historyLimit: number = DEFAULT_CHANGE_HISTORY_LIMIT,
): boolean {
  const moved = list.items.find((item) => item.itemId === itemId)
  if (!moved) {
    throw new ItemNotFoundError(itemId)
  }
  if (!Number.isFinite(newPosition)) {
    throw new RangeError(`Invalid position: ${newPosition}`)
  }

  const oldPosition = moved.position
  const target = Math.min(
    Math.max(Math.trunc(newPosition), 0),
    list.items.length - 1,
  )
  if (oldPosition === target) {
    return false
  }

  const now = new Date()
  for (const item of list.items) {
    if (item === moved) continue

    let shifted = false
    if (oldPosition < target) {
      // Moving forward: items in (old, new] step back
      if (item.position > oldPosition && item.position <= target) {
        item.position--
        shifted = true
      }
    } else if (item.position >= target && item.position < oldPosition) {
      // Moving backward: items in [new, old) step forward
      item.position++
      shifted = true
    }

    if (shifted) {
      stampChanged(item, now)
      appendChangeRecord(item, actorId, 'reorder', now, historyLimit)
    }
  }

  moved.position = target
  stampChanged(moved, now)
  appendChangeRecord(moved, actorId, 'reorder', now, historyLimit)

  sortByPosition(list.items)
  touchList(list, actorId, now)

  return true
}
