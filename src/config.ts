import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { z } from 'zod';
import { DEFAULT_TEMPLATE_NAME, TYPESCRIPT_TYPE_BY_COLUMN_TYPE } from './generator/defaults.js';
import { ConfigError, describeError } from './generator/errors.js';
import { camelize, lowerCamel, snakeCase } from './generator/naming.js';
import { GENERATED_FILE_EXTENSION } from './generator/output.js';
import type {
  ClassNameMapper,
  OutputDirectoryMapper,
  PropertyNameMapper,
  TableNameFilter,
  TemplateNameMapper,
  TypeNameMapper
} from './generator/types.js';
import type { GeneratorOptions } from './index.js';

const regexSource = z.string().refine((source) => {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}, 'must be a valid regular expression');

const generatorConfigSchema = z.object({
  connection: z.object({
    driver: z.string().min(1).default('pg'),
    url: z.string().min(1),
    user: z.string().default(''),
    password: z.string().optional(),
    passwordEnv: z.string().min(1).optional()
  }),
  schema: z.string().min(1).optional(),
  tables: z
    .object({
      include: z.array(regexSource).default([]),
      exclude: z.array(regexSource).default([])
    })
    .default({}),
  classNames: z
    .object({
      prefix: z.string().default(''),
      suffixes: z.array(z.string()).default([''])
    })
    .default({}),
  properties: z
    .object({
      naming: z.enum(['camel', 'snake', 'preserve']).default('camel')
    })
    .default({}),
  types: z
    .object({
      preset: z.enum(['typescript', 'none']).default('none'),
      overrides: z.record(z.string()).default({}),
      fallback: z.string().optional()
    })
    .default({}),
  templates: z
    .object({
      directory: z.string().min(1).default('templates'),
      default: z.string().min(1).default(DEFAULT_TEMPLATE_NAME),
      rules: z.array(z.object({ pattern: regexSource, template: z.string().min(1) })).default([])
    })
    .default({}),
  output: z.object({
    directory: z.string().min(1),
    extension: z.string().default(GENERATED_FILE_EXTENSION),
    rules: z.array(z.object({ pattern: regexSource, directory: z.string().min(1) })).default([])
  })
});

export type GeneratorConfig = z.infer<typeof generatorConfigSchema>;

export function parseGeneratorConfig(raw: unknown): GeneratorConfig {
  const result = generatorConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid generator configuration:\n  ${issues.join('\n  ')}`);
  }
  return result.data;
}

export async function loadGeneratorConfig(configPath: string): Promise<GeneratorConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Unable to read ${configPath}: ${describeError(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`${configPath} is not valid JSON: ${describeError(error)}`, { cause: error });
  }
  return parseGeneratorConfig(raw);
}

function firstMatch<T extends { pattern: string }>(rules: readonly T[], value: string): T | undefined {
  return rules.find((rule) => new RegExp(rule.pattern).test(value));
}

function createTableNameFilter(config: GeneratorConfig): TableNameFilter {
  const include = config.tables.include.map((source) => new RegExp(source));
  const exclude = config.tables.exclude.map((source) => new RegExp(source));
  return (tableName) =>
    (include.length === 0 || include.some((pattern) => pattern.test(tableName))) &&
    !exclude.some((pattern) => pattern.test(tableName));
}

function createClassNameMapper(config: GeneratorConfig): ClassNameMapper {
  const { prefix, suffixes } = config.classNames;
  return (tableName) => suffixes.map((suffix) => `${prefix}${camelize(tableName)}${suffix}`);
}

function createPropertyNameMapper(config: GeneratorConfig): PropertyNameMapper {
  switch (config.properties.naming) {
    case 'camel':
      return (columnName) => lowerCamel(camelize(columnName));
    case 'snake':
      return (columnName) => snakeCase(columnName);
    case 'preserve':
      return (columnName) => columnName;
  }
}

function createTypeNameMapper(config: GeneratorConfig): TypeNameMapper {
  const table = new Map<string, string>(config.types.preset === 'typescript' ? TYPESCRIPT_TYPE_BY_COLUMN_TYPE : []);
  for (const [columnType, targetType] of Object.entries(config.types.overrides)) {
    table.set(columnType.toLowerCase(), targetType);
  }
  const { fallback } = config.types;
  return (typeName) => table.get(typeName.toLowerCase()) ?? fallback ?? typeName;
}

function createTemplateNameMapper(config: GeneratorConfig): TemplateNameMapper {
  return (className) => firstMatch(config.templates.rules, className)?.template ?? config.templates.default;
}

function createOutputDirectoryMapper(config: GeneratorConfig, baseDirectory: string): OutputDirectoryMapper {
  return (className) => {
    const directory = firstMatch(config.output.rules, className)?.directory ?? config.output.directory;
    return path.resolve(baseDirectory, directory);
  };
}

/**
 * Turns a validated configuration into generator options. Relative
 * directories are resolved against `baseDirectory`, normally the directory
 * holding the configuration file.
 */
export function toGeneratorOptions(
  config: GeneratorConfig,
  baseDirectory: string,
  env: Record<string, string | undefined> = process.env
): GeneratorOptions {
  const { connection } = config;
  const password = connection.password ?? (connection.passwordEnv ? env[connection.passwordEnv] : undefined) ?? '';

  return {
    driver: connection.driver,
    url: connection.url,
    user: connection.user,
    password,
    schemaName: config.schema,
    classNameMapper: createClassNameMapper(config),
    typeNameMapper: createTypeNameMapper(config),
    propertyNameMapper: createPropertyNameMapper(config),
    tableNameFilter: createTableNameFilter(config),
    templateDirectory: path.resolve(baseDirectory, config.templates.directory),
    templateNameMapper: createTemplateNameMapper(config),
    outputDirectoryMapper: createOutputDirectoryMapper(config, baseDirectory),
    fileExtension: config.output.extension
  };
}
