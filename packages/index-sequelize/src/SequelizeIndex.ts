import { QueryTypes } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type { Coordinates, Page, PointIndex } from '@pipjoin/core';
import { FetchIdBatchError, FetchPointError, InitialisationError, errorMessage } from '@pipjoin/core';
import { ADDRESS_REGISTER_QUERIES } from './queries.js';
import type { IndexQueries } from './queries.js';
import { toCoordinates, toIdentifiers, toTotal } from './mappers/RowMapper.js';

export type SequelizeIndexOptions = Partial<IndexQueries>;

/**
 * Sequelize-based index adapter for `@pipjoin/core`.
 *
 * Pages identifiers with LIMIT/OFFSET and looks points up by key with raw
 * queries, so any dialect Sequelize supports works as long as the queries
 * are written for it. Defaults target the address register schema on
 * PostgreSQL.
 *
 * Build with `SequelizeIndex.create()`, which counts the records once. Whether
 * more pages follow is decided against that count, not by probing.
 */
export class SequelizeIndex implements PointIndex {
  private constructor(
    private readonly sequelize: Sequelize,
    private readonly queries: IndexQueries,
    private readonly total: number,
  ) {}

  static async create(sequelize: Sequelize, options: SequelizeIndexOptions = {}): Promise<SequelizeIndex> {
    const queries: IndexQueries = {
      countQuery: options.countQuery ?? ADDRESS_REGISTER_QUERIES.countQuery,
      pageQuery: options.pageQuery ?? ADDRESS_REGISTER_QUERIES.pageQuery,
      pointQuery: options.pointQuery ?? ADDRESS_REGISTER_QUERIES.pointQuery,
    };

    let total: number;
    try {
      const rows: unknown[] = await sequelize.query(queries.countQuery, { type: QueryTypes.SELECT });
      total = toTotal(rows);
    } catch (error) {
      throw new InitialisationError(errorMessage(error), { cause: error });
    }

    return new SequelizeIndex(sequelize, queries, total);
  }

  /** Record count taken when the index was created. */
  get size(): number {
    return this.total;
  }

  async fetchPage(pageIndex: number, pageSize: number): Promise<Page> {
    try {
      const rows: unknown[] = await this.sequelize.query(this.queries.pageQuery, {
        type: QueryTypes.SELECT,
        replacements: { limit: pageSize, offset: pageSize * (pageIndex - 1) },
      });
      return {
        identifiers: toIdentifiers(rows),
        hasMore: pageIndex * pageSize < this.total,
      };
    } catch (error) {
      throw new FetchIdBatchError(pageIndex, pageSize, errorMessage(error), { cause: error });
    }
  }

  async getPoint(identifier: string): Promise<Coordinates> {
    let rows: unknown[];
    try {
      rows = await this.sequelize.query(this.queries.pointQuery, {
        type: QueryTypes.SELECT,
        replacements: { id: identifier },
      });
    } catch (error) {
      throw new FetchPointError(identifier, errorMessage(error), { cause: error });
    }

    const row = rows[0];
    if (row === undefined) {
      throw new FetchPointError(identifier, 'no row');
    }

    try {
      return toCoordinates(row);
    } catch (error) {
      throw new FetchPointError(identifier, errorMessage(error), { cause: error });
    }
  }

  async close(): Promise<void> {
    await this.sequelize.close();
  }
}
