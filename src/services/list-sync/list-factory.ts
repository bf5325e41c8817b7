import type {
  CreateOrderedListInput,
  OrderedList,
} from '@root/types/list-sync.types.js'

/**
 * Creates an empty list that satisfies every list invariant.
 */
export function createOrderedList(input: CreateOrderedListInput): OrderedList {
  return {
    id: input.id ?? 0,
    listType: input.listType,
    details: {
      title: input.title,
      description: input.description ?? '',
    },
    ownerId: input.ownerId,
    isPublic: input.isPublic ?? false,
    sharedWith: [...(input.sharedWith ?? [])],
    originClientId: input.originClientId ?? 0,
    items: [],
    itemCount: 0,
    syncStates: new Map(),
    lastModified: new Date(),
    modifiedBy: input.ownerId,
    lastSynced: null,
  }
}

/**
 * Deep copy of a list, including items, history and client states.
 */
export function cloneOrderedList(list: OrderedList): OrderedList {
  return structuredClone(list)
}
