import type { DatabaseConnection } from "../drivers/connection.js";

export interface ColumnDesc {
  readonly columnName: string;
  readonly typeName: string;
  readonly nullable: boolean;
  readonly size?: number;
}

export interface PrimaryKeyDesc {
  readonly keyName?: string;
  readonly columnName: string;
  /** Ordinal position exactly as the metadata source reported it. */
  readonly keySequence: string;
}

export interface TableDesc {
  readonly tableName: string;
  readonly primaryKeys: readonly PrimaryKeyDesc[];
  readonly columns: readonly ColumnDesc[];
}

export interface PropertyEntry {
  name: string;
  camelizeName: string;
  typeName: string;
  nullable: boolean;
}

export interface RenderContext {
  className: string;
  lowerCamelClassName: string;
  primaryKeys: PropertyEntry[];
  columns: PropertyEntry[];
  primaryKeysWithColumns: PropertyEntry[];
}

export type ClassNameMapper = (tableName: string) => readonly string[];
export type TypeNameMapper = (typeName: string) => string;
export type PropertyNameMapper = (columnName: string) => string;
export type TableNameFilter = (tableName: string) => boolean;
export type TemplateNameMapper = (className: string) => string;
export type OutputDirectoryMapper = (className: string) => string;

export interface GeneratorLogger {
  info(message: string): void;
  warn(message: string): void;
}

export interface GenerationContext {
  readonly connection: DatabaseConnection;
  readonly classNameMapper: ClassNameMapper;
  readonly typeNameMapper: TypeNameMapper;
  readonly propertyNameMapper: PropertyNameMapper;
  readonly tableNameFilter: TableNameFilter;
  readonly schemaName?: string;
  readonly templateDirectory: string;
  readonly templateNameMapper: TemplateNameMapper;
  readonly outputDirectoryMapper: OutputDirectoryMapper;
  readonly fileExtension: string;
  /** Render every file but leave the output directories untouched. */
  readonly dryRun: boolean;
  readonly logger: GeneratorLogger;
}

export interface GeneratedFile {
  tableName: string;
  className: string;
  templateName: string;
  filePath: string;
  content: string;
  written: boolean;
}
