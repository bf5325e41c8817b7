import type { FastifyBaseLogger } from 'fastify'

export type ListType = 'playlist' | 'collection'

/**
 * Media servers that keep their own copy of a list. Used as the
 * `serviceKind` when translating item ids.
 */
export type MediaClientType = 'plex' | 'jellyfin' | 'emby' | 'subsonic'

export type ChangeKind = 'add' | 'remove' | 'update' | 'reorder'

export interface ChangeRecord {
  /** Client or user id that made the change (0 = application level) */
  actorId: number
  kind: ChangeKind
  timestamp: Date
}

export interface ListItem {
  itemId: number
  position: number
  lastChanged: Date
  changeHistory: ChangeRecord[]
}

/**
 * One entry of a client's view of a list, keyed by the client's own item id.
 */
export interface SyncListItem {
  externalItemId: string
  position: number
  lastChanged: Date
  changeHistory: ChangeRecord[]
}

export interface SyncClientState {
  clientId: number
  /** Id of the corresponding list on the client */
  externalListId: string
  items: SyncListItem[]
  lastSyncedAt: Date
}

export interface ListDetails {
  title: string
  description: string
}

export interface OrderedList {
  id: number
  listType: ListType
  details: ListDetails
  ownerId: number
  isPublic: boolean
  sharedWith: number[]
  /** 0 for lists created locally, otherwise the client the list came from */
  originClientId: number
  items: ListItem[]
  itemCount: number
  syncStates: Map<number, SyncClientState>
  lastModified: Date
  modifiedBy: number
  lastSynced: Date | null
}

export interface CreateOrderedListInput {
  id?: number
  listType: ListType
  title: string
  description?: string
  ownerId: number
  isPublic?: boolean
  sharedWith?: number[]
  originClientId?: number
}

export interface NewListItem {
  itemId: number
  /** Omitted or out of range means append */
  position?: number
}

/**
 * Translates between internal item ids and a client's native ids.
 * Both directions reject with a MappingError when no mapping exists.
 */
export interface IdMappingService {
  externalToInternal(
    externalId: string,
    serviceKind: MediaClientType,
  ): Promise<number>
  internalToExternal(
    internalId: number,
    serviceKind: MediaClientType,
  ): Promise<string>
}

export type InvariantViolationKind =
  | 'duplicate-position'
  | 'missing-position'
  | 'item-count-mismatch'
  | 'duplicate-item-id'
  | 'client-state-key-mismatch'

export interface InvariantViolation {
  kind: InvariantViolationKind
  message: string
}

export type ClientSyncStatus = 'unsynced' | 'synced' | 'diverged'

export interface ListSyncSettings {
  /** Change records kept per item; older ones are dropped */
  changeHistoryLimit: number
  /** Concurrent id lookups against the mapping service */
  mappingConcurrency: number
}

export interface ListSyncDeps {
  logger: FastifyBaseLogger
  config: ListSyncSettings
}

/**
 * An incoming entry after its native id has been translated.
 */
export interface MappedIncomingItem {
  itemId: number
  clientId: number
  source: SyncListItem
}

export interface MappedIncomingBatch {
  items: MappedIncomingItem[]
  /** Native ids that could not be translated */
  dropped: string[]
}

export interface ReconciliationResult {
  added: number
  updated: number
  removed: number
  dropped: string[]
  changed: boolean
}
