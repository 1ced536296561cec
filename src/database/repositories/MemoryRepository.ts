import { Repository } from '../../types/database.js';
import { CatalogEntityKind, CatalogEntityMap } from '../../types/models.js';
import { DatabaseError, ErrorCode } from '../../errors/index.js';

type RecordMaps = { [K in CatalogEntityKind]: Map<string, CatalogEntityMap[K]> };

/**
 * Process-local repository. Records are cloned on the way in and out.
 */
export class MemoryRepository implements Repository {
  readonly driver = 'memory' as const;

  private readonly records: RecordMaps = {
    artist: new Map(),
    album: new Map(),
  };

  async get<K extends CatalogEntityKind>(kind: K, id: string): Promise<CatalogEntityMap[K] | null> {
    const key = requireId(kind, id, 'get');
    const record = this.records[kind].get(key);
    return record ? structuredClone(record) : null;
  }

  async put<K extends CatalogEntityKind>(kind: K, record: CatalogEntityMap[K]): Promise<void> {
    const key = requireId(kind, record.id, 'put');
    this.records[kind].set(key, structuredClone(record));
  }

  async close(): Promise<void> {
    this.records.artist.clear();
    this.records.album.clear();
  }
}

export function requireId(kind: CatalogEntityKind, id: string, operation: string): string {
  const key = id.trim();
  if (!key) {
    throw new DatabaseError(
      `${kind} id is required`,
      ErrorCode.DATABASE_QUERY_FAILED,
      false,
      { service: 'Repository', operation, entityType: kind }
    );
  }
  return key;
}
