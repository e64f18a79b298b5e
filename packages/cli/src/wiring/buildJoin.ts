import { Sequelize } from 'sequelize';
import {
  CsvFileSink,
  JoinEngine,
  LinkedDataRegister,
  WfsPolygonMatcher,
} from '@pipjoin/core';
import type { Logger, PointIndex } from '@pipjoin/core';
import { SequelizeIndex } from '@pipjoin/index-sequelize';
import type { IndexConfig, JoinConfig } from '../config/JoinConfig.js';

/** PostgreSQL connection with query logging routed to the debug level. */
export function createSequelize(connectionString: string, logger: Logger): Sequelize {
  return new Sequelize(connectionString, {
    dialect: 'postgres',
    logging: (sql) => {
      logger.debug({ sql }, 'query');
    },
  });
}

/** Build the index selected by `backend`. Rejects with `InitialisationError` when a database index cannot count its records. */
export async function createIndex(config: IndexConfig, logger: Logger): Promise<PointIndex> {
  switch (config.backend) {
    case 'database': {
      const sequelize = createSequelize(config.connectionString, logger);
      try {
        return await SequelizeIndex.create(sequelize, {
          countQuery: config.countQuery,
          pageQuery: config.pageQuery,
          pointQuery: config.pointQuery,
        });
      } catch (error) {
        await sequelize.close();
        throw error;
      }
    }
    case 'linked-data-api':
      return new LinkedDataRegister({ endpoint: config.endpoint, timeoutMs: config.timeoutMs });
  }
}

export function buildJoin(config: JoinConfig, index: PointIndex, logger: Logger): JoinEngine {
  return new JoinEngine({
    pager: index,
    points: index,
    polygons: new WfsPolygonMatcher(config.polygonService),
    sink: new CsvFileSink(config.outputFile),
    predicate: config.predicate,
    startPage: config.startPage,
    stopPage: config.stopPage,
    pageSize: config.pageSize,
    concurrency: config.concurrency,
    firstSequence: config.firstSequence,
    logger,
  });
}
