import { camelize, lowerCamel } from "./naming.js";
import type {
  ClassNameMapper,
  PropertyNameMapper,
  TableNameFilter,
  TemplateNameMapper,
  TypeNameMapper,
} from "./types.js";

export const DEFAULT_TEMPLATE_NAME = "template.njk";

/** Native column types as PostgreSQL reports them (`udt_name`). */
export const TYPESCRIPT_TYPE_BY_COLUMN_TYPE = new Map<string, string>(
  Object.entries({
    bool: "boolean",
    boolean: "boolean",
    int2: "number",
    int4: "number",
    integer: "number",
    smallint: "number",
    int8: "string",
    bigint: "string",
    float4: "number",
    float8: "number",
    real: "number",
    numeric: "string",
    decimal: "string",
    money: "string",
    varchar: "string",
    bpchar: "string",
    char: "string",
    text: "string",
    citext: "string",
    uuid: "string",
    date: "Date",
    timestamp: "Date",
    timestamptz: "Date",
    time: "string",
    timetz: "string",
    interval: "string",
    bytea: "Buffer",
    json: "unknown",
    jsonb: "unknown",
  })
);

export const defaultClassNameMapper: ClassNameMapper = (tableName) => [camelize(tableName)];

export const defaultPropertyNameMapper: PropertyNameMapper = (columnName) =>
  lowerCamel(camelize(columnName));

export const defaultTypeNameMapper: TypeNameMapper = (typeName) => typeName;

export const defaultTableNameFilter: TableNameFilter = () => true;

export const defaultTemplateNameMapper: TemplateNameMapper = () => DEFAULT_TEMPLATE_NAME;
