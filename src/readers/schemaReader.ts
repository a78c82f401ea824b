import type { DatabaseConnection, MetadataResultSet, MetadataRow } from '../drivers/connection.js';
import { SchemaReadError, describeError } from '../generator/errors.js';
import type { ColumnDesc, PrimaryKeyDesc, TableDesc } from '../generator/types.js';

const TABLE_TYPE = 'TABLE';
const ANY_NAME = '%';

function requireString(row: MetadataRow, label: string): string {
  const value = row[label];
  if (typeof value !== 'string') {
    throw new SchemaReadError(`Metadata row is missing ${label}`);
  }
  return value;
}

function optionalString(row: MetadataRow, label: string): string | undefined {
  return row[label] ?? undefined;
}

function parseColumnSize(row: MetadataRow): number | undefined {
  const raw = optionalString(row, 'COLUMN_SIZE');
  if (raw === undefined) return undefined;
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new SchemaReadError(`COLUMN_SIZE is not an integer: ${raw}`);
  }
  return Number.parseInt(raw, 10);
}

/**
 * Runs one catalog query, collects its rows and always closes the result set.
 * Rows for which `collect` returns undefined are skipped.
 */
async function readMetadata<T>(
  description: string,
  open: () => Promise<MetadataResultSet>,
  collect: (row: MetadataRow) => T | undefined
): Promise<T[]> {
  let resultSet: MetadataResultSet | undefined;
  const items: T[] = [];
  try {
    resultSet = await open();
    for await (const row of resultSet) {
      const item = collect(row);
      if (item !== undefined) items.push(item);
    }
  } catch (error) {
    await resultSet?.close().catch(() => undefined);
    if (error instanceof SchemaReadError) throw error;
    throw new SchemaReadError(`Failed to read ${description}: ${describeError(error)}`, { cause: error });
  }

  try {
    await resultSet.close();
  } catch (error) {
    throw new SchemaReadError(`Failed to close ${description}: ${describeError(error)}`, { cause: error });
  }
  return items;
}

export async function listTables(connection: DatabaseConnection, schemaName?: string): Promise<string[]> {
  const metadata = connection.getMetadata();
  return readMetadata(
    'tables',
    () => metadata.getTables(schemaName ?? null, ANY_NAME, [TABLE_TYPE]),
    (row) => (row.TABLE_TYPE === TABLE_TYPE ? requireString(row, 'TABLE_NAME') : undefined)
  );
}

export async function listColumns(connection: DatabaseConnection, schemaName: string | undefined, tableName: string): Promise<ColumnDesc[]> {
  const metadata = connection.getMetadata();
  return readMetadata(
    `columns of ${tableName}`,
    () => metadata.getColumns(schemaName ?? null, tableName, ANY_NAME),
    (row): ColumnDesc => ({
      columnName: requireString(row, 'COLUMN_NAME'),
      typeName: requireString(row, 'TYPE_NAME'),
      nullable: row.IS_NULLABLE === 'YES',
      size: parseColumnSize(row)
    })
  );
}

export async function listPrimaryKeys(
  connection: DatabaseConnection,
  schemaName: string | undefined,
  tableName: string
): Promise<PrimaryKeyDesc[]> {
  const metadata = connection.getMetadata();
  return readMetadata(
    `primary keys of ${tableName}`,
    () => metadata.getPrimaryKeys(schemaName ?? null, tableName),
    (row): PrimaryKeyDesc => ({
      keyName: optionalString(row, 'PK_NAME'),
      columnName: requireString(row, 'COLUMN_NAME'),
      keySequence: requireString(row, 'KEY_SEQ')
    })
  );
}

export async function readAllTableDescs(connection: DatabaseConnection, schemaName?: string): Promise<TableDesc[]> {
  const tableNames = await listTables(connection, schemaName);
  const tables: TableDesc[] = [];
  for (const tableName of tableNames) {
    tables.push({
      tableName,
      primaryKeys: await listPrimaryKeys(connection, schemaName, tableName),
      columns: await listColumns(connection, schemaName, tableName)
    });
  }
  return tables;
}
