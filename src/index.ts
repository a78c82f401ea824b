import { withConnection, type DatabaseConnection, type DriverRegistry } from "./drivers/connection.js";
import { postgresDriver } from "./drivers/postgres.js";
import {
  defaultClassNameMapper,
  defaultPropertyNameMapper,
  defaultTableNameFilter,
  defaultTemplateNameMapper,
  defaultTypeNameMapper,
} from "./generator/defaults.js";
import { generateAll, generateMany, generateOne } from "./generator/generate.js";
import { GENERATED_FILE_EXTENSION } from "./generator/output.js";
import type {
  ClassNameMapper,
  GeneratedFile,
  GenerationContext,
  GeneratorLogger,
  OutputDirectoryMapper,
  PropertyNameMapper,
  TableNameFilter,
  TemplateNameMapper,
  TypeNameMapper,
} from "./generator/types.js";

export const DEFAULT_DRIVERS: DriverRegistry = new Map([
  ["pg", postgresDriver],
  ["postgres", postgresDriver],
  ["postgresql", postgresDriver],
]);

export interface GeneratorOptions {
  driver: string;
  url: string;
  user?: string;
  password?: string;
  schemaName?: string;
  classNameMapper?: ClassNameMapper;
  typeNameMapper?: TypeNameMapper;
  propertyNameMapper?: PropertyNameMapper;
  tableNameFilter?: TableNameFilter;
  templateDirectory: string;
  templateNameMapper?: TemplateNameMapper;
  outputDirectoryMapper: OutputDirectoryMapper;
  fileExtension?: string;
  dryRun?: boolean;
  logger?: GeneratorLogger;
  /** Extra drivers; an entry replaces a built-in driver registered under the same name. */
  drivers?: DriverRegistry;
}

export type GenerationRequest =
  | { kind: "all" }
  | { kind: "one"; tableName: string }
  | { kind: "many"; tableNames: readonly string[] };

export function createGenerationContext(
  connection: DatabaseConnection,
  options: GeneratorOptions
): GenerationContext {
  return {
    connection,
    classNameMapper: options.classNameMapper ?? defaultClassNameMapper,
    typeNameMapper: options.typeNameMapper ?? defaultTypeNameMapper,
    propertyNameMapper: options.propertyNameMapper ?? defaultPropertyNameMapper,
    tableNameFilter: options.tableNameFilter ?? defaultTableNameFilter,
    schemaName: options.schemaName,
    templateDirectory: options.templateDirectory,
    templateNameMapper: options.templateNameMapper ?? defaultTemplateNameMapper,
    outputDirectoryMapper: options.outputDirectoryMapper,
    fileExtension: options.fileExtension ?? GENERATED_FILE_EXTENSION,
    dryRun: options.dryRun ?? false,
    logger: options.logger ?? console,
  };
}

export async function runGeneration(
  options: GeneratorOptions,
  request: GenerationRequest
): Promise<GeneratedFile[]> {
  const logger = options.logger ?? console;
  logger.info(`driver = ${options.driver}`);
  logger.info(`url = ${options.url}`);
  logger.info(`user = ${options.user ?? ""}`);

  const drivers: DriverRegistry = new Map([...DEFAULT_DRIVERS, ...(options.drivers ?? [])]);
  const settings = {
    drivers,
    driver: options.driver,
    url: options.url,
    user: options.user ?? "",
    password: options.password ?? "",
  };

  return withConnection(settings, (connection) =>
    dispatch(createGenerationContext(connection, options), request)
  );
}

function dispatch(context: GenerationContext, request: GenerationRequest): Promise<GeneratedFile[]> {
  switch (request.kind) {
    case "one":
      return generateOne(context, request.tableName);
    case "many":
      return generateMany(context, request.tableNames);
    case "all":
      return generateAll(context);
  }
}

export * from "./generator/errors.js";
export type * from "./generator/types.js";
export type {
  ConnectionProperties,
  DatabaseConnection,
  DatabaseDriver,
  DatabaseMetadata,
  DriverRegistry,
  MetadataResultSet,
  MetadataRow,
} from "./drivers/connection.js";
export { connect, createResultSet, withConnection } from "./drivers/connection.js";
export { PostgresConnection, PostgresMetadata, postgresDriver } from "./drivers/postgres.js";
export { listColumns, listPrimaryKeys, listTables, readAllTableDescs } from "./readers/schemaReader.js";
export { buildColumnEntries, buildPrimaryKeyEntries, buildRenderContext } from "./generator/mapping.js";
export { camelize, lowerCamel, snakeCase } from "./generator/naming.js";
export { createTemplateRenderer, type TemplateRenderer } from "./generator/render.js";
export { resolveOutputPath, writeGeneratedFile, GENERATED_FILE_EXTENSION } from "./generator/output.js";
export { generateAll, generateMany, generateOne } from "./generator/generate.js";
export { TYPESCRIPT_TYPE_BY_COLUMN_TYPE } from "./generator/defaults.js";
export { loadGeneratorConfig, parseGeneratorConfig, toGeneratorOptions, type GeneratorConfig } from "./config.js";
export { DEFAULT_CONFIG_FILES, discoverConfigFile } from "./discovery.js";
