export { SequelizeIndex } from './SequelizeIndex.js';
export type { SequelizeIndexOptions } from './SequelizeIndex.js';
export { ADDRESS_REGISTER_QUERIES } from './queries.js';
export type { IndexQueries } from './queries.js';
