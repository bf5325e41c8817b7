import type { DatabaseService } from '@services/database.service.js'
import { MappingError } from '@root/types/errors.js'
import type {
  IdMappingService,
  MediaClientType,
} from '@root/types/list-sync.types.js'

/**
 * Id mapping backed by the `id_mappings` table.
 */
export class DatabaseIdMappingService implements IdMappingService {
  constructor(private readonly db: DatabaseService) {}

  async externalToInternal(
    externalId: string,
    serviceKind: MediaClientType,
  ): Promise<number> {
    const internalId = await this.db.getInternalIdForExternal(
      externalId,
      serviceKind,
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
    const externalId = await this.db.getExternalIdForInternal(
      internalId,
      serviceKind,
    )
    if (externalId === undefined) {
      throw new MappingError(internalId, serviceKind, 'toExternal')
    }
    return externalId
  }

  /**
   * Records the native id of an item on a client service
   */
  async link(
    internalId: number,
    serviceKind: MediaClientType,
    externalId: string,
  ): Promise<void> {
    await this.db.upsertIdMapping(internalId, serviceKind, externalId)
  }
}
