import { ConnectionError, describeError } from '../generator/errors.js';

export type MetadataRow = Readonly<Record<string, string | null>>;

export interface MetadataResultSet extends AsyncIterable<MetadataRow> {
  close(): Promise<void>;
}

/**
 * Catalog queries every driver answers. Rows are keyed by the standard catalog
 * column labels (`TABLE_NAME`, `TABLE_TYPE`, `COLUMN_NAME`, `TYPE_NAME`,
 * `IS_NULLABLE`, `COLUMN_SIZE`, `PK_NAME`, `KEY_SEQ`).
 */
export interface DatabaseMetadata {
  getTables(schemaName: string | null, tableNamePattern: string, types: readonly string[]): Promise<MetadataResultSet>;
  getColumns(schemaName: string | null, tableName: string, columnNamePattern: string): Promise<MetadataResultSet>;
  getPrimaryKeys(schemaName: string | null, tableName: string): Promise<MetadataResultSet>;
}

export interface DatabaseConnection {
  getMetadata(): DatabaseMetadata;
  close(): Promise<void>;
}

export interface ConnectionProperties {
  user: string;
  password: string;
}

export interface DatabaseDriver {
  connect(url: string, properties: ConnectionProperties): Promise<DatabaseConnection>;
}

export type DriverRegistry = ReadonlyMap<string, DatabaseDriver>;

export interface ConnectionSettings {
  drivers: DriverRegistry;
  driver: string;
  url: string;
  user: string;
  password: string;
}

export function createResultSet(rows: readonly MetadataRow[]): MetadataResultSet {
  let closed = false;
  return {
    async *[Symbol.asyncIterator]() {
      for (const row of rows) {
        if (closed) throw new Error('Result set is closed');
        yield row;
      }
    },
    async close() {
      closed = true;
    }
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isDatabaseDriver(value: unknown): value is DatabaseDriver {
  return isRecord(value) && typeof value.connect === 'function';
}

async function loadDriverModule(driverIdentifier: string): Promise<DatabaseDriver> {
  let driverModule: unknown;
  try {
    driverModule = await import(driverIdentifier);
  } catch (error) {
    throw new ConnectionError(`Unable to load driver ${driverIdentifier}: ${describeError(error)}`, { cause: error });
  }

  if (isRecord(driverModule)) {
    const candidate = driverModule.default ?? driverModule.driver;
    if (isDatabaseDriver(candidate)) return candidate;
  }
  throw new ConnectionError(`Module ${driverIdentifier} does not export a database driver`);
}

export async function resolveDriver(drivers: DriverRegistry, driverIdentifier: string): Promise<DatabaseDriver> {
  return drivers.get(driverIdentifier) ?? loadDriverModule(driverIdentifier);
}

export async function connect(
  drivers: DriverRegistry,
  driverIdentifier: string,
  url: string,
  user: string,
  password: string
): Promise<DatabaseConnection> {
  const driver = await resolveDriver(drivers, driverIdentifier);
  const properties: ConnectionProperties = { user, password };
  try {
    return await driver.connect(url, properties);
  } catch (error) {
    if (error instanceof ConnectionError) throw error;
    throw new ConnectionError(`Failed to connect to ${url}: ${describeError(error)}`, { cause: error });
  }
}

export async function withConnection<T>(
  settings: ConnectionSettings,
  work: (connection: DatabaseConnection) => Promise<T>
): Promise<T> {
  const connection = await connect(settings.drivers, settings.driver, settings.url, settings.user, settings.password);
  let result: T;
  try {
    result = await work(connection);
  } catch (error) {
    // A failed close must not replace the work's error.
    await connection.close().catch(() => undefined);
    throw error;
  }

  try {
    await connection.close();
  } catch (error) {
    throw new ConnectionError(`Failed to close connection to ${settings.url}: ${describeError(error)}`, { cause: error });
  }
  return result;
}
