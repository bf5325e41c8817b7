import { z } from 'zod'

export const ListSyncConfigSchema = z.object({
  // Change records kept per list item before the oldest are dropped
  changeHistoryLimit: z.number().int().positive().default(50),
  // Concurrent lookups against the id mapping service during one operation
  mappingConcurrency: z.number().int().positive().default(10),
})

export type ListSyncConfig = z.infer<typeof ListSyncConfigSchema>
