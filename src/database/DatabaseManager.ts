import { DatabaseConfig } from '../config/types.js';
import { Repository } from '../types/database.js';
import { SqliteConnection } from './connections/SqliteConnection.js';
import { MemoryRepository } from './repositories/MemoryRepository.js';
import { SqliteRepository } from './repositories/SqliteRepository.js';
import { logger } from '../middleware/logging.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';

/**
 * Owns the configured repository for the lifetime of the process
 */
export class DatabaseManager {
  private repository: Repository | null = null;

  constructor(private readonly config: DatabaseConfig) {}

  async connect(): Promise<Repository> {
    if (this.repository) {
      return this.repository;
    }

    const repository = await this.createRepository();
    this.repository = repository;

    logger.info('Repository ready', {
      driver: this.config.driver,
      ...(this.config.driver === 'sqlite' && { filename: this.config.filename }),
    });

    return repository;
  }

  private async createRepository(): Promise<Repository> {
    switch (this.config.driver) {
      case 'memory':
        return new MemoryRepository();
      case 'sqlite': {
        const connection = new SqliteConnection(this.config.filename);
        await connection.connect();
        const repository = new SqliteRepository(connection);
        await repository.initialize();
        return repository;
      }
    }
  }

  async disconnect(): Promise<void> {
    if (this.repository) {
      await this.repository.close();
      this.repository = null;
    }
  }

  isConnected(): boolean {
    return this.repository !== null;
  }

  getRepository(): Repository {
    if (!this.repository) {
      throw new DatabaseError(
        'Repository not initialized. Call connect() first.',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        { service: 'DatabaseManager', operation: 'getRepository' }
      );
    }
    return this.repository;
  }
}
