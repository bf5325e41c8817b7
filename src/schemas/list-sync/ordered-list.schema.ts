import { z } from 'zod'

export const ChangeRecordSchema = z.object({
  actorId: z.number().int().nonnegative(),
  kind: z.enum(['add', 'remove', 'update', 'reorder']),
  timestamp: z.coerce.date(),
})

export const ListItemSchema = z.object({
  itemId: z.number().int(),
  position: z.number().int().nonnegative(),
  lastChanged: z.coerce.date(),
  changeHistory: z.array(ChangeRecordSchema),
})

// Client snapshots are stored as reported: ids the client uses may be empty
// and positions are the client's own, so only values JSON can carry are required
export const SyncListItemSchema = z.object({
  externalItemId: z.string(),
  position: z.number().finite(),
  lastChanged: z.coerce.date(),
  changeHistory: z.array(ChangeRecordSchema),
})

export const SyncClientStateSchema = z.object({
  clientId: z.number().int().nonnegative(),
  externalListId: z.string(),
  items: z.array(SyncListItemSchema),
  lastSyncedAt: z.coerce.date(),
})

// Stored form of an ordered list: one JSON document per list, with the
// per-client states kept as an array
export const OrderedListDocumentSchema = z
  .object({
    id: z.number().int().nonnegative(),
    listType: z.enum(['playlist', 'collection']),
    details: z.object({
      title: z.string(),
      description: z.string(),
    }),
    ownerId: z.number().int().nonnegative(),
    isPublic: z.boolean(),
    sharedWith: z.array(z.number().int()),
    originClientId: z.number().int().nonnegative(),
    items: z.array(ListItemSchema),
    itemCount: z.number().int().nonnegative(),
    syncStates: z.array(SyncClientStateSchema),
    lastModified: z.coerce.date(),
    modifiedBy: z.number().int().nonnegative(),
    lastSynced: z.coerce.date().nullable(),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<number>()
    for (const state of doc.syncStates) {
      if (seen.has(state.clientId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['syncStates'],
          message: `Duplicate sync state for client ${state.clientId}`,
        })
      }
      seen.add(state.clientId)
    }
  })

export type OrderedListDocument = z.infer<typeof OrderedListDocumentSchema>
