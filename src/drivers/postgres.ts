import pg from 'pg';
import {
  createResultSet,
  type ConnectionProperties,
  type DatabaseConnection,
  type DatabaseDriver,
  type DatabaseMetadata,
  type MetadataResultSet,
  type MetadataRow
} from './connection.js';

export type QueryRunner = (sql: string, params: unknown[]) => Promise<MetadataRow[]>;

// information_schema reports BASE TABLE / VIEW / FOREIGN / LOCAL TEMPORARY;
// relabel them with the standard catalog table types so callers can filter on TABLE.
const TABLES_SQL = `
SELECT "TABLE_SCHEM", "TABLE_NAME", "TABLE_TYPE"
FROM (
  SELECT
    table_schema AS "TABLE_SCHEM",
    table_name AS "TABLE_NAME",
    CASE
      WHEN table_schema IN ('pg_catalog', 'information_schema') AND table_type = 'VIEW' THEN 'SYSTEM VIEW'
      WHEN table_schema IN ('pg_catalog', 'information_schema') THEN 'SYSTEM TABLE'
      WHEN table_type = 'BASE TABLE' THEN 'TABLE'
      WHEN table_type = 'FOREIGN' THEN 'FOREIGN TABLE'
      WHEN table_type = 'LOCAL TEMPORARY' THEN 'TEMPORARY TABLE'
      ELSE table_type
    END AS "TABLE_TYPE"
  FROM information_schema.tables
  WHERE ($1::text IS NULL OR table_schema = $1)
    AND table_name LIKE $2
) AS t
WHERE "TABLE_TYPE" = ANY($3::text[])
ORDER BY "TABLE_TYPE", "TABLE_SCHEM", "TABLE_NAME"`;

const COLUMNS_SQL = `
SELECT
  column_name AS "COLUMN_NAME",
  udt_name AS "TYPE_NAME",
  is_nullable AS "IS_NULLABLE",
  COALESCE(character_maximum_length, numeric_precision, datetime_precision)::text AS "COLUMN_SIZE",
  ordinal_position::text AS "ORDINAL_POSITION"
FROM information_schema.columns
WHERE ($1::text IS NULL OR table_schema = $1)
  AND table_name = $2
  AND column_name LIKE $3
ORDER BY table_schema, ordinal_position`;

const PRIMARY_KEYS_SQL = `
SELECT
  tc.constraint_name AS "PK_NAME",
  kcu.column_name AS "COLUMN_NAME",
  kcu.ordinal_position::text AS "KEY_SEQ"
FROM information_schema.table_constraints AS tc
JOIN information_schema.key_column_usage AS kcu
  ON kcu.constraint_schema = tc.constraint_schema
 AND kcu.constraint_name = tc.constraint_name
 AND kcu.table_name = tc.table_name
WHERE tc.constraint_type = 'PRIMARY KEY'
  AND ($1::text IS NULL OR tc.table_schema = $1)
  AND tc.table_name = $2
ORDER BY kcu.ordinal_position`;

export class PostgresMetadata implements DatabaseMetadata {
  constructor(private readonly runQuery: QueryRunner) {}

  async getTables(schemaName: string | null, tableNamePattern: string, types: readonly string[]): Promise<MetadataResultSet> {
    const rows = await this.runQuery(TABLES_SQL, [schemaName, tableNamePattern, [...types]]);
    return createResultSet(rows);
  }

  async getColumns(schemaName: string | null, tableName: string, columnNamePattern: string): Promise<MetadataResultSet> {
    const rows = await this.runQuery(COLUMNS_SQL, [schemaName, tableName, columnNamePattern]);
    return createResultSet(rows);
  }

  async getPrimaryKeys(schemaName: string | null, tableName: string): Promise<MetadataResultSet> {
    const rows = await this.runQuery(PRIMARY_KEYS_SQL, [schemaName, tableName]);
    return createResultSet(rows);
  }
}

export class PostgresConnection implements DatabaseConnection {
  private readonly metadata: PostgresMetadata;

  constructor(private readonly client: pg.Client) {
    this.metadata = new PostgresMetadata(async (sql, params) => {
      const result = await this.client.query<MetadataRow>(sql, params);
      return result.rows;
    });
  }

  getMetadata(): DatabaseMetadata {
    return this.metadata;
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

export const postgresDriver: DatabaseDriver = {
  async connect(url: string, properties: ConnectionProperties): Promise<DatabaseConnection> {
    const client = new pg.Client({
      connectionString: url,
      user: properties.user || undefined,
      password: properties.password || undefined
    });
    await client.connect();
    return new PostgresConnection(client);
  }
};
