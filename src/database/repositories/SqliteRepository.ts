import { ZodType, ZodTypeDef } from 'zod';
import { DatabaseConnection, Repository } from '../../types/database.js';
import { CatalogEntityKind, CatalogEntityMap } from '../../types/models.js';
import { albumSchema, artistSchema } from '../../validation/catalogSchemas.js';
import { DatabaseError, ErrorCode } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';
import { requireId } from './MemoryRepository.js';

const TABLES = {
  artist: 'artists',
  album: 'albums',
} as const satisfies Record<CatalogEntityKind, string>;

const SCHEMAS: { [K in CatalogEntityKind]: ZodType<CatalogEntityMap[K], ZodTypeDef, unknown> } = {
  artist: artistSchema,
  album: albumSchema,
};

interface PayloadRow {
  payload: string;
}

/**
 * SQLite-backed repository
 *
 * One table per entity kind, each row holding the record as a JSON payload.
 * Payloads are validated on the way out, so a row written by an older build
 * is upgraded with defaults or rejected as a store failure.
 */
export class SqliteRepository implements Repository {
  readonly driver = 'sqlite' as const;

  constructor(private readonly db: DatabaseConnection) {}

  async initialize(): Promise<void> {
    for (const table of Object.values(TABLES)) {
      await this.db.execute(
        `CREATE TABLE IF NOT EXISTS ${table} (
          id TEXT PRIMARY KEY,
          payload TEXT NOT NULL,
          updated_at TIMESTAMP NOT NULL
        )`
      );
    }

    logger.debug('[SqliteRepository] Schema ready', {
      service: 'SqliteRepository',
      operation: 'initialize',
      tables: Object.values(TABLES),
    });
  }

  async get<K extends CatalogEntityKind>(kind: K, id: string): Promise<CatalogEntityMap[K] | null> {
    const key = requireId(kind, id, 'get');
    const row = await this.db.get<PayloadRow>(
      `SELECT payload FROM ${TABLES[kind]} WHERE id = ?`,
      [key]
    );

    if (!row) {
      return null;
    }

    return this.decode(kind, key, row.payload);
  }

  async put<K extends CatalogEntityKind>(kind: K, record: CatalogEntityMap[K]): Promise<void> {
    const key = requireId(kind, record.id, 'put');

    await this.db.execute(
      `INSERT INTO ${TABLES[kind]} (id, payload, updated_at)
       VALUES (?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         payload = excluded.payload,
         updated_at = excluded.updated_at`,
      [key, JSON.stringify(record), new Date().toISOString()]
    );

    logger.debug('[SqliteRepository] Record saved', {
      service: 'SqliteRepository',
      operation: 'put',
      entityType: kind,
      entityId: key,
    });
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  private decode<K extends CatalogEntityKind>(kind: K, id: string, payload: string): CatalogEntityMap[K] {
    const context = {
      service: 'SqliteRepository',
      operation: 'get',
      entityType: kind,
      entityId: id,
    };

    let raw: unknown;
    try {
      raw = JSON.parse(payload);
    } catch (error) {
      throw new DatabaseError(
        `Stored ${kind} payload is not valid JSON: ${id}`,
        ErrorCode.DATABASE_QUERY_FAILED,
        false,
        context,
        error instanceof Error ? error : undefined
      );
    }

    const result = SCHEMAS[kind].safeParse(raw);
    if (!result.success) {
      throw new DatabaseError(
        `Stored ${kind} payload failed validation: ${id}`,
        ErrorCode.DATABASE_QUERY_FAILED,
        false,
        { ...context, metadata: { issues: result.error.issues.map(issue => issue.message) } },
        result.error
      );
    }

    return result.data;
  }
}
