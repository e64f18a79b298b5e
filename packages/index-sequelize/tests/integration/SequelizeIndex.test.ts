import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { Sequelize } from 'sequelize';
import { FetchIdBatchError, FetchPointError, InitialisationError } from '@pipjoin/core';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { SQLite3Wrapper } from '../better-sqlite3-adapter.js';
import { SequelizeIndex } from '../../src/SequelizeIndex.js';
import type { SequelizeIndexOptions } from '../../src/SequelizeIndex.js';

const QUERIES: SequelizeIndexOptions = {
  countQuery: 'SELECT count(*) AS total FROM addresses',
  pageQuery: 'SELECT pid AS id FROM addresses ORDER BY pid LIMIT :limit OFFSET :offset',
  pointQuery: 'SELECT lon AS longitude, lat AS latitude FROM addresses WHERE pid = :id',
};

/** A001..A010; Axxx lies at (148 + n / 4, -(30 + n)). */
function seed(dbPath: string): void {
  const db = new Database(dbPath);
  db.exec('CREATE TABLE addresses (pid TEXT PRIMARY KEY, lon REAL, lat REAL)');
  const insert = db.prepare('INSERT INTO addresses (pid, lon, lat) VALUES (?, ?, ?)');
  for (let n = 1; n <= 10; n++) {
    insert.run(`A${String(n).padStart(3, '0')}`, 148 + n / 4, -(30 + n));
  }
  db.close();
}

describe('SequelizeIndex', () => {
  let sequelize: Sequelize;
  let dbPath: string;

  beforeEach(() => {
    dbPath = path.join(os.tmpdir(), `test-index-${String(Date.now())}-${String(Math.random())}.sqlite`);
    seed(dbPath);
    sequelize = new Sequelize({
      dialect: 'sqlite',
      storage: dbPath,
      logging: false,
      dialectModule: { Database: SQLite3Wrapper },
      pool: {
        max: 1,
        min: 1,
        idle: 30000,
        acquire: 60000,
        evict: 30000,
      },
    });
  });

  afterEach(async () => {
    try {
      await sequelize.close();
    } catch {
      // already closed by the test
    }
    fs.rmSync(dbPath, { force: true });
  });

  describe('create', () => {
    it('should count the records once', async () => {
      const index = await SequelizeIndex.create(sequelize, QUERIES);

      expect(index.size).toBe(10);
    });

    it('should fail initialisation when the count query fails', async () => {
      const result = SequelizeIndex.create(sequelize, { ...QUERIES, countQuery: 'SELECT count(*) AS total FROM nowhere' });

      await expect(result).rejects.toBeInstanceOf(InitialisationError);
      await expect(result).rejects.toThrow('Index initialisation failed: ');
    });

    it('should fail initialisation when the count is not a number', async () => {
      await expect(SequelizeIndex.create(sequelize, { ...QUERIES, countQuery: "SELECT 'many' AS total" })).rejects.toThrow(
        'Index initialisation failed: malformed count row: total:',
      );
    });
  });

  describe('fetchPage', () => {
    it('should return a full page while more records follow', async () => {
      const index = await SequelizeIndex.create(sequelize, QUERIES);

      const page = await index.fetchPage(2, 4);

      expect(page).toEqual({ identifiers: ['A005', 'A006', 'A007', 'A008'], hasMore: true });
    });

    it('should return the remainder on the last page', async () => {
      const index = await SequelizeIndex.create(sequelize, QUERIES);

      const page = await index.fetchPage(3, 4);

      expect(page).toEqual({ identifiers: ['A009', 'A010'], hasMore: false });
    });

    it('should report no more pages when the count is reached exactly', async () => {
      const index = await SequelizeIndex.create(sequelize, QUERIES);

      const page = await index.fetchPage(2, 5);

      expect(page.identifiers).toEqual(['A006', 'A007', 'A008', 'A009', 'A010']);
      expect(page.hasMore).toBe(false);
    });

    it('should fail the page when the query fails', async () => {
      const index = await SequelizeIndex.create(sequelize, {
        ...QUERIES,
        pageQuery: 'SELECT pid AS id FROM nowhere LIMIT :limit OFFSET :offset',
      });

      const result = index.fetchPage(1, 4);

      await expect(result).rejects.toBeInstanceOf(FetchIdBatchError);
      await expect(result).rejects.toThrow('Failed to fetch page 1 (size 4): ');
    });
  });

  describe('getPoint', () => {
    it('should return the coordinates of the record', async () => {
      const index = await SequelizeIndex.create(sequelize, QUERIES);

      await expect(index.getPoint('A003')).resolves.toEqual({ longitude: '148.75', latitude: '-33' });
    });

    it('should fail when the record does not exist', async () => {
      const index = await SequelizeIndex.create(sequelize, QUERIES);

      const result = index.getPoint('Z999');

      await expect(result).rejects.toBeInstanceOf(FetchPointError);
      await expect(result).rejects.toThrow('Failed to fetch point for Z999: no row');
    });

    it('should fail when the row has no coordinates', async () => {
      const index = await SequelizeIndex.create(sequelize, {
        ...QUERIES,
        pointQuery: 'SELECT lon AS longitude FROM addresses WHERE pid = :id',
      });

      await expect(index.getPoint('A001')).rejects.toThrow('Failed to fetch point for A001: malformed point row: latitude:');
    });
  });

  describe('close', () => {
    it('should release the connection', async () => {
      const index = await SequelizeIndex.create(sequelize, QUERIES);

      await index.close();

      await expect(index.fetchPage(1, 4)).rejects.toBeInstanceOf(FetchIdBatchError);
    });
  });
});
