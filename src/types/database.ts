import { CatalogEntityKind, CatalogEntityMap } from './models.js';

export type StorageDriver = 'sqlite' | 'memory';

/**
 * Valid SQL parameter types
 * Includes undefined for optional parameters
 */
export type SqlParam = string | number | boolean | null | undefined | Buffer;

export interface DatabaseConnection {
  get<T>(sql: string, params?: SqlParam[]): Promise<T | undefined>;
  execute(sql: string, params?: SqlParam[]): Promise<{ affectedRows: number; insertId?: number }>;
  close(): Promise<void>;
}

/**
 * Keyed persistence for catalog records.
 *
 * Unknown ids resolve to null. Writes are upserts: the last write for an id
 * wins. Implementations hand out copies, so mutating a returned record never
 * changes what is stored.
 */
export interface Repository {
  readonly driver: StorageDriver;
  get<K extends CatalogEntityKind>(kind: K, id: string): Promise<CatalogEntityMap[K] | null>;
  put<K extends CatalogEntityKind>(kind: K, record: CatalogEntityMap[K]): Promise<void>;
  close(): Promise<void>;
}
