import type { ListItem, OrderedList } from '@root/types/list-sync.types.js'

export function findItemById(
  list: OrderedList,
  itemId: number,
): ListItem | undefined {
  return list.items.find((item) => item.itemId === itemId)
}

/**
 * Item ids in position order.
 */
export function getItemIds(list: OrderedList): number[] {
  return [...list.items]
    .sort((a, b) => a.position - b.position)
    .map((item) => item.itemId)
}

/**
 * Returns one zero-based page of items in position order. Negative pages,
 * non-positive page sizes and pages past the end yield an empty array.
 */
export function getPage(
  list: OrderedList,
  page: number,
  pageSize: number,
): ListItem[] {
  if (page < 0 || pageSize <= 0) {
    return []
  }

  const start = page * pageSize
  if (start >= list.items.length) {
    return []
  }

  const ordered = [...list.items].sort((a, b) => a.position - b.position)
  return ordered.slice(start, Math.min(start + pageSize, ordered.length))
}
