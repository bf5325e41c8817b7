/**
 * List Serialization Module
 *
 * Converts an ordered list to and from the single JSON document it is stored
 * as. Dates travel as ISO strings and client states as an array.
 */

import {
  type OrderedListDocument,
  OrderedListDocumentSchema,
} from '@schemas/list-sync/ordered-list.schema.js'
import type {
  OrderedList,
  SyncClientState,
} from '@root/types/list-sync.types.js'

export function serializeOrderedList(list: OrderedList): string {
  return JSON.stringify({
    ...list,
    syncStates: [...list.syncStates.values()],
  })
}

export function fromListDocument(doc: OrderedListDocument): OrderedList {
  return {
    ...doc,
    syncStates: new Map<number, SyncClientState>(
      doc.syncStates.map((state) => [state.clientId, state]),
    ),
  }
}

/**
 * Parses and validates a stored list document.
 *
 * @throws SyntaxError on malformed JSON, ZodError on a document of the wrong shape
 */
export function deserializeOrderedList(json: string): OrderedList {
  const doc = OrderedListDocumentSchema.parse(JSON.parse(json))
  return fromListDocument(doc)
}
