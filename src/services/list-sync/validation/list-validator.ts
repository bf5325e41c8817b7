/**
 * List Validation Module
 *
 * Read-only integrity checks for an ordered list. Intended for tests, health
 * checks and the service's pre-persist guard; never mutates the list.
 */

import type {
  InvariantViolation,
  OrderedList,
} from '@root/types/list-sync.types.js'

/**
 * Checks the list's structural invariants.
 *
 * @returns Every violation found; empty when the list is consistent
 */
export function validateItems(list: OrderedList): InvariantViolation[] {
  const issues: InvariantViolation[] = []

  const seenPositions = new Set<number>()
  for (const item of list.items) {
    if (seenPositions.has(item.position)) {
      issues.push({
        kind: 'duplicate-position',
        message: `duplicate position: ${item.position}`,
      })
    }
    seenPositions.add(item.position)
  }

  for (let position = 0; position < list.items.length; position++) {
    if (!seenPositions.has(position)) {
      issues.push({
        kind: 'missing-position',
        message: `missing position: ${position}`,
      })
    }
  }

  if (list.itemCount !== list.items.length) {
    issues.push({
      kind: 'item-count-mismatch',
      message: `itemCount ${list.itemCount} does not match ${list.items.length} items`,
    })
  }

  const seenIds = new Set<number>()
  for (const item of list.items) {
    if (seenIds.has(item.itemId)) {
      issues.push({
        kind: 'duplicate-item-id',
        message: `duplicate item id: ${item.itemId}`,
      })
    }
    seenIds.add(item.itemId)
  }

  for (const [clientId, state] of list.syncStates) {
    if (state.clientId !== clientId) {
      issues.push({
        kind: 'client-state-key-mismatch',
        message: `sync state stored under client ${clientId} belongs to client ${state.clientId}`,
      })
    }
  }

  return issues
}
