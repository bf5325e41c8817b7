import type { OrderedList } from '@root/types/list-sync.types.js'
import { cloneOrderedList } from '../list-factory.js'
import { normalizePositions } from '../positions/index.js'

/**
 * Combines two lists without modifying either: the result is a copy of
 * `primary` followed by the items of `secondary` that `primary` lacks, in
 * their order in `secondary`.
 */
export function mergeLists(
  primary: OrderedList,
  secondary: OrderedList,
): OrderedList {
  const result = cloneOrderedList(primary)
  const present = new Set(result.items.map((item) => item.itemId))

  const additions = cloneOrderedList(secondary)
    .items.filter((item) => !present.has(item.itemId))
    .sort((a, b) => a.position - b.position)

  let next = result.items.length
  for (const item of additions) {
    item.position = next++
    result.items.push(item)
  }

  normalizePositions(result)
  result.itemCount = result.items.length
  result.lastModified = new Date()

  return result
}
