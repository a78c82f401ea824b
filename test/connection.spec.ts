import { describe, expect, it, vi } from 'vitest';
import {
  connect,
  createResultSet,
  withConnection,
  type ConnectionProperties,
  type DatabaseDriver
} from '../src/drivers/connection.js';
import { ConnectionError, TableNotFoundError } from '../src/generator/errors.js';
import { FakeConnection } from './support/fakeConnection.js';

function recordingDriver(connection = new FakeConnection([])) {
  const calls: Array<{ url: string; properties: ConnectionProperties }> = [];
  const driver: DatabaseDriver = {
    async connect(url, properties) {
      calls.push({ url, properties });
      return connection;
    }
  };
  return { driver, calls, connection };
}

describe('connect', () => {
  it('passes user and password to the registered driver', async () => {
    const { driver, calls, connection } = recordingDriver();
    const opened = await connect(new Map([['fake', driver]]), 'fake', 'fake://db', 'app', 'test-secret');

    expect(opened).toBe(connection);
    expect(calls).toEqual([{ url: 'fake://db', properties: { user: 'app', password: 'test-secret' } }]);
  });

  it('fails with ConnectionError when the driver cannot be resolved', async () => {
    await expect(connect(new Map(), 'no-such-driver-module', 'fake://db', 'app', 'test-secret')).rejects.toBeInstanceOf(
      ConnectionError
    );
  });

  it('wraps handshake failures', async () => {
    const driver: DatabaseDriver = {
      connect: vi.fn().mockRejectedValue(new Error('password authentication failed'))
    };
    await expect(connect(new Map([['fake', driver]]), 'fake', 'fake://db', 'app', 'wrong')).rejects.toThrow(
      'Failed to connect to fake://db: password authentication failed'
    );
  });
});

describe('withConnection', () => {
  const settings = (driver: DatabaseDriver) => ({
    drivers: new Map([['fake', driver]]),
    driver: 'fake',
    url: 'fake://db',
    user: 'app',
    password: 'test-secret'
  });

  it('returns the result of the work and closes the connection', async () => {
    const { driver, connection } = recordingDriver();
    await expect(withConnection(settings(driver), async () => 42)).resolves.toBe(42);
    expect(connection.closed).toBe(true);
  });

  it('closes the connection when the work fails', async () => {
    const { driver, connection } = recordingDriver();
    await expect(
      withConnection(settings(driver), async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(connection.closed).toBe(true);
  });
});

describe('withConnection when close fails', () => {
  class BrokenCloseConnection extends FakeConnection {
    closeAttempts = 0;

    override async close(): Promise<void> {
      this.closeAttempts += 1;
      throw new Error('socket already closed');
    }
  }

  const settingsFor = (connection: FakeConnection) => ({
    drivers: new Map([['fake', recordingDriver(connection).driver]]),
    driver: 'fake',
    url: 'fake://db',
    user: 'app',
    password: 'test-secret'
  });

  it('keeps the error of the failed work', async () => {
    const connection = new BrokenCloseConnection([]);
    const failure = withConnection(settingsFor(connection), async () => {
      throw new TableNotFoundError('ghost');
    });

    await expect(failure).rejects.toBeInstanceOf(TableNotFoundError);
    await expect(failure).rejects.toThrow('Table not found: ghost');
    expect(connection.closeAttempts).toBe(1);
  });

  it('reports ConnectionError when the work succeeded', async () => {
    const connection = new BrokenCloseConnection([]);
    const failure = withConnection(settingsFor(connection), async () => 'done');

    await expect(failure).rejects.toBeInstanceOf(ConnectionError);
    await expect(failure).rejects.toThrow('Failed to close connection to fake://db: socket already closed');
    expect(connection.closeAttempts).toBe(1);
  });
});

describe('createResultSet', () => {
  it('yields the rows in order', async () => {
    const resultSet = createResultSet([{ TABLE_NAME: 'a' }, { TABLE_NAME: 'b' }]);
    const names: Array<string | null> = [];
    for await (const row of resultSet) {
      names.push(row.TABLE_NAME ?? null);
    }
    expect(names).toEqual(['a', 'b']);
  });

  it('refuses to be read after it was closed', async () => {
    const resultSet = createResultSet([{ TABLE_NAME: 'a' }]);
    await resultSet.close();
    await expect(resultSet[Symbol.asyncIterator]().next()).rejects.toThrow('Result set is closed');
  });
});
