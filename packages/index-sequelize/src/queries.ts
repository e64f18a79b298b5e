/**
 * SQL run by `SequelizeIndex`. Named replacements (`:limit`, `:offset`, `:id`)
 * are filled in by Sequelize; result columns must be aliased to the names below.
 */
export interface IndexQueries {
  /** One row with a `total` column. */
  readonly countQuery: string;
  /** `id` rows in a stable order, bounded by `:limit` and `:offset`. */
  readonly pageQuery: string;
  /** At most one row with `longitude` and `latitude` for `:id`. */
  readonly pointQuery: string;
}

/** Queries against the national address register schema. */
export const ADDRESS_REGISTER_QUERIES: IndexQueries = {
  countQuery: 'SELECT count(*) AS total FROM gnaf.address_detail',
  pageQuery:
    'SELECT address_detail_pid AS id FROM gnaf.address_detail ' +
    'ORDER BY address_detail_pid LIMIT :limit OFFSET :offset',
  pointQuery:
    'SELECT longitude, latitude FROM gnaf.address_default_geocode WHERE address_detail_pid = :id',
};
