import type { MappedIncomingItem } from '@root/types/list-sync.types.js'

/**
 * Whether `candidate` should replace `current` as the entry for an item:
 * the later `lastChanged` wins, and on identical timestamps the lower
 * client id wins so repeated merges produce the same result.
 */
export function isPreferredEntry(
  candidate: MappedIncomingItem,
  current: MappedIncomingItem,
): boolean {
  const difference =
    candidate.source.lastChanged.getTime() -
    current.source.lastChanged.getTime()
  if (difference !== 0) {
    return difference > 0
  }
  return candidate.clientId < current.clientId
}

/**
 * Reduces entries to one per internal item id using last-writer-wins.
 * Winners keep the order in which their item id was first seen.
 */
export function selectWinningEntries(
  entries: MappedIncomingItem[],
): MappedIncomingItem[] {
  const winners = new Map<number, MappedIncomingItem>()
  for (const entry of entries) {
    const current = winners.get(entry.itemId)
    if (!current || isPreferredEntry(entry, current)) {
      winners.set(entry.itemId, entry)
    }
  }
  return [...winners.values()]
}
