import { MappingError } from '@root/types/errors.js'
import type {
  IdMappingService,
  MediaClientType,
} from '@root/types/list-sync.types.js'

export interface IdMappingEntry {
  internalId: number
  serviceKind: MediaClientType
  externalId: string
}

/**
 * In-memory id mapping backed by a lookup table. Each (internal id, service)
 * pair maps to exactly one native id and vice versa; setting a pair replaces
 * any previous mapping on either side.
 */
export class TableIdMappingService implements IdMappingService {
  private readonly toExternal = new Map<string, string>()
  private readonly toInternal = new Map<string, number>()

  constructor(entries: IdMappingEntry[] = []) {
    for (const entry of entries) {
      this.set(entry)
    }
  }

  set(entry: IdMappingEntry): void {
    const previousExternal = this.toExternal.get(
      this.internalKey(entry.internalId, entry.serviceKind),
    )
    if (previousExternal !== undefined) {
      this.toInternal.delete(
        this.externalKey(previousExternal, entry.serviceKind),
      )
    }
    const previousInternal = this.toInternal.get(
      this.externalKey(entry.externalId, entry.serviceKind),
    )
    if (previousInternal !== undefined) {
      this.toExternal.delete(
        this.internalKey(previousInternal, entry.serviceKind),
      )
    }

    this.toExternal.set(
      this.internalKey(entry.internalId, entry.serviceKind),
      entry.externalId,
    )
    this.toInternal.set(
      this.externalKey(entry.externalId, entry.serviceKind),
      entry.internalId,
    )
  }

  async externalToInternal(
    externalId: string,
    serviceKind: MediaClientType,
  ): Promise<number> {
    const internalId = this.toInternal.get(
      this.externalKey(externalId, serviceKind),
    )
    if (internalId === undefined) {
      throw new MappingError(externalId, serviceKind, 'toInternal')
    }
    return internalId
  }

  async internalToExternal(
    internalId: number,
    serviceKind: MediaClientType,
  ): Promise<string> {
    const externalId = this.toExternal.get(
      this.internalKey(internalId, serviceKind),
    )
    if (externalId === undefined) {
      throw new MappingError(internalId, serviceKind, 'toExternal')
    }
    return externalId
  }

  private internalKey(internalId: number, serviceKind: MediaClientType) {
    return `${serviceKind}:${internalId}`
  }

  private externalKey(externalId: string, serviceKind: MediaClientType) {
    return `${serviceKind}:${externalId}`
  }
}
