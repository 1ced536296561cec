import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { SqliteConnection, IN_MEMORY_DATABASE } from '../../src/database/connections/SqliteConnection.js';
import { SqliteRepository } from '../../src/database/repositories/SqliteRepository.js';
import { DatabaseError } from '../../src/errors/index.js';
import { describeRepositoryContract } from './repositoryContract.js';

async function createRepository(): Promise<{ connection: SqliteConnection; repository: SqliteRepository }> {
  const connection = new SqliteConnection(IN_MEMORY_DATABASE);
  await connection.connect();
  const repository = new SqliteRepository(connection);
  await repository.initialize();
  return { connection, repository };
}

describeRepositoryContract('SqliteRepository', async () => (await createRepository()).repository);

describe('SqliteRepository', () => {
  let connection: SqliteConnection;
  let repository: SqliteRepository;

  beforeEach(async () => {
    ({ connection, repository } = await createRepository());
  });

  afterEach(async () => {
    await repository.close();
  });

  it('should report the sqlite driver', () => {
    expect(repository.driver).toBe('sqlite');
  });

  it('should create tables idempotently', async () => {
    await repository.initialize();

    const tables = await connection.get<{ names: string }>(
      "SELECT group_concat(name, ',') AS names FROM " +
      "(SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name)"
    );
    expect(tables?.names).toBe('albums,artists');
  });

  it('should keep one row per id', async () => {
    await connection.execute(
      'INSERT INTO artists (id, payload, updated_at) VALUES (?, ?, ?)',
      ['a1', JSON.stringify({ id: 'a1', name: 'Before' }), '2024-01-01T00:00:00.000Z']
    );

    const stored = await repository.get('artist', 'a1');
    expect(stored?.name).toBe('Before');

    if (stored) {
      await repository.put('artist', { ...stored, name: 'After' });
    }

    const rows = await connection.get<{ count: number }>('SELECT COUNT(*) AS count FROM artists');
    expect(rows?.count).toBe(1);
    expect((await repository.get('artist', 'a1'))?.name).toBe('After');
  });

  it('should fill fields missing from older payloads with defaults', async () => {
    await connection.execute(
      'INSERT INTO albums (id, payload, updated_at) VALUES (?, ?, ?)',
      ['old', JSON.stringify({ id: 'old', title: 'Old Album' }), '2024-01-01T00:00:00.000Z']
    );

    await expect(repository.get('album', 'old')).resolves.toEqual({
      id: 'old',
      title: 'Old Album',
      artistId: '',
      artistName: '',
      primaryType: '',
      secondaryTypes: [],
      firstReleaseDate: '',
      year: 0,
      genre: '',
      label: '',
      tracks: [],
      review: { source: '', author: '', rating: 0, summary: '', text: '', url: '' },
      coverUrl: '',
    });
  });

  it('should reject payloads that fail validation', async () => {
    await connection.execute(
      'INSERT INTO artists (id, payload, updated_at) VALUES (?, ?, ?)',
      ['broken', JSON.stringify({ id: 'broken' }), '2024-01-01T00:00:00.000Z']
    );

    await expect(repository.get('artist', 'broken'))
      .rejects.toThrow('Stored artist payload failed validation: broken');
  });

  it('should reject payloads that are not JSON', async () => {
    await connection.execute(
      'INSERT INTO artists (id, payload, updated_at) VALUES (?, ?, ?)',
      ['garbled', '{not json', '2024-01-01T00:00:00.000Z']
    );

    await expect(repository.get('artist', 'garbled')).rejects.toThrow(DatabaseError);
  });

  it('should fail reads after the connection is closed', async () => {
    await connection.close();

    await expect(repository.get('artist', 'a1')).rejects.toThrow('Database not connected');
  });
});
