import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { DatabaseDriver } from '../src/drivers/connection.js';
import { TableNotFoundError } from '../src/generator/errors.js';
import { runGeneration, type GeneratorOptions } from '../src/index.js';
import { AUDIT_LOG_TABLE, FakeConnection, USERS_TABLE } from './support/fakeConnection.js';
import { DAO_TEMPLATE, createWorkspace } from './support/workspace.js';

let root: string | undefined;

afterEach(async () => {
  if (root) await fs.rm(root, { recursive: true, force: true });
  root = undefined;
});

async function setup() {
  const workspace = await createWorkspace({ 'template.njk': DAO_TEMPLATE });
  root = workspace.root;
  const connection = new FakeConnection([USERS_TABLE, AUDIT_LOG_TABLE]);
  const driver: DatabaseDriver = { connect: vi.fn().mockResolvedValue(connection) };
  const logger = { info: vi.fn(), warn: vi.fn() };
  const options: GeneratorOptions = {
    driver: 'fake',
    url: 'fake://db',
    user: 'app',
    password: 'test-secret',
    templateDirectory: workspace.templateDirectory,
    outputDirectoryMapper: () => workspace.outputDirectory,
    logger,
    drivers: new Map([['fake', driver]])
  };
  return { options, connection, driver, logger, outputDirectory: workspace.outputDirectory };
}

describe('runGeneration', () => {
  it('connects, generates with default mappers and closes the connection', async () => {
    const { options, connection, driver, outputDirectory } = await setup();

    const files = await runGeneration(options, { kind: 'all' });

    expect(driver.connect).toHaveBeenCalledWith('fake://db', { user: 'app', password: 'test-secret' });
    expect(files.map((file) => file.filePath)).toEqual([
      path.join(outputDirectory, 'Users.ts'),
      path.join(outputDirectory, 'AuditLog.ts')
    ]);
    await expect(fs.readFile(path.join(outputDirectory, 'AuditLog.ts'), 'utf8')).resolves.toBe(
      'export const auditLog = new AuditLog();'
    );
    expect(connection.closed).toBe(true);
  });

  it('logs the connection target without the password', async () => {
    const { options, logger } = await setup();

    await runGeneration(options, { kind: 'many', tableNames: ['users'] });

    expect(logger.info).toHaveBeenNthCalledWith(1, 'driver = fake');
    expect(logger.info).toHaveBeenNthCalledWith(2, 'url = fake://db');
    expect(logger.info).toHaveBeenNthCalledWith(3, 'user = app');
  });

  it('closes the connection when generation fails', async () => {
    const { options, connection } = await setup();

    await expect(runGeneration(options, { kind: 'one', tableName: 'ghost_table' })).rejects.toBeInstanceOf(
      TableNotFoundError
    );
    expect(connection.closed).toBe(true);
  });
});
