import sqlite3 from 'sqlite3';
import path from 'path';
import fs from 'fs';
import { DatabaseConnection, SqlParam } from '../../types/database.js';
import { DatabaseError, ErrorCode } from '../../errors/index.js';

export const IN_MEMORY_DATABASE = ':memory:';

/**
 * Promise wrapper over the sqlite3 callback API
 */
export class SqliteConnection implements DatabaseConnection {
  private db: sqlite3.Database | null = null;

  constructor(private readonly filename: string) {}

  async connect(): Promise<void> {
    if (this.db) {
      return;
    }

    if (this.filename !== IN_MEMORY_DATABASE) {
      const dir = path.dirname(this.filename);
      try {
        fs.mkdirSync(dir, { recursive: true });
      } catch (err) {
        throw new DatabaseError(
          `Failed to create database directory: ${dir}`,
          ErrorCode.DATABASE_CONNECTION_FAILED,
          false,
          { service: 'SqliteConnection', operation: 'connect', metadata: { dir } },
          err instanceof Error ? err : undefined
        );
      }
    }

    this.db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const db = new sqlite3.Database(this.filename, err => {
        if (err) {
          reject(new DatabaseError(
            `Failed to connect to SQLite database: ${err.message}`,
            ErrorCode.DATABASE_CONNECTION_FAILED,
            true,
            {
              service: 'SqliteConnection',
              operation: 'connect',
              metadata: { filename: this.filename },
            },
            err
          ));
        } else {
          resolve(db);
        }
      });
    });
  }

  async get<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const db = this.requireConnection('get');

    return new Promise((resolve, reject) => {
      db.get<T>(sql, params, (err, row) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'get'));
        } else {
          resolve(row);
        }
      });
    });
  }

  async execute(
    sql: string,
    params: SqlParam[] = []
  ): Promise<{ affectedRows: number; insertId?: number }> {
    const db = this.requireConnection('execute');
    const convert = (err: Error) => this.convertDatabaseError(err, sql, 'execute');

    return new Promise((resolve, reject) => {
      db.run(sql, params, function (err) {
        if (err) {
          reject(convert(err));
        } else {
          // `this` is the statement context carrying changes and lastID
          resolve({
            affectedRows: this.changes,
            insertId: this.lastID,
          });
        }
      });
    });
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) {
      return;
    }

    return new Promise((resolve, reject) => {
      db.close(err => {
        if (err) {
          reject(new DatabaseError(
            `Failed to close database: ${err.message}`,
            ErrorCode.DATABASE_CONNECTION_FAILED,
            false,
            { service: 'SqliteConnection', operation: 'close' },
            err
          ));
        } else {
          this.db = null;
          resolve();
        }
      });
    });
  }

  private requireConnection(operation: string): sqlite3.Database {
    if (!this.db) {
      throw new DatabaseError(
        'Database not connected',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        { service: 'SqliteConnection', operation }
      );
    }
    return this.db;
  }

  private convertDatabaseError(error: Error, sql: string, operation: string): DatabaseError {
    return new DatabaseError(
      `Database ${operation} failed: ${error.message}`,
      ErrorCode.DATABASE_QUERY_FAILED,
      !error.message.toLowerCase().includes('constraint'),
      {
        service: 'SqliteConnection',
        operation,
        metadata: { sql, sqliteError: error.message },
      },
      error
    );
  }
}
