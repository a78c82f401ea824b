import { MappingError } from "./errors.js";
import { camelize, lowerCamel } from "./naming.js";
import type {
  ColumnDesc,
  PropertyEntry,
  PropertyNameMapper,
  RenderContext,
  TableDesc,
  TypeNameMapper,
} from "./types.js";

function toEntry(
  typeNameMapper: TypeNameMapper,
  propertyNameMapper: PropertyNameMapper,
  column: ColumnDesc
): PropertyEntry {
  return {
    name: propertyNameMapper(column.columnName),
    camelizeName: camelize(column.columnName),
    typeName: typeNameMapper(column.typeName),
    nullable: column.nullable,
  };
}

export function buildPrimaryKeyEntries(
  typeNameMapper: TypeNameMapper,
  propertyNameMapper: PropertyNameMapper,
  table: TableDesc
): PropertyEntry[] {
  return table.primaryKeys.map((key) => {
    const column = table.columns.find((candidate) => candidate.columnName === key.columnName);
    if (!column) {
      throw new MappingError(
        `Primary key column ${key.columnName} not found in table ${table.tableName}`
      );
    }
    return toEntry(typeNameMapper, propertyNameMapper, column);
  });
}

export function buildColumnEntries(
  typeNameMapper: TypeNameMapper,
  propertyNameMapper: PropertyNameMapper,
  table: TableDesc
): PropertyEntry[] {
  const keyColumns = new Set(table.primaryKeys.map((key) => key.columnName));
  return table.columns
    .filter((column) => !keyColumns.has(column.columnName))
    .map((column) => toEntry(typeNameMapper, propertyNameMapper, column));
}

export function buildRenderContext(
  primaryKeys: PropertyEntry[],
  columns: PropertyEntry[],
  className: string
): RenderContext {
  return {
    className,
    lowerCamelClassName: lowerCamel(className),
    primaryKeys,
    columns,
    primaryKeysWithColumns: [...primaryKeys, ...columns],
  };
}
