import { readAllTableDescs } from "../readers/schemaReader.js";
import { TableNotFoundError } from "./errors.js";
import { buildColumnEntries, buildPrimaryKeyEntries, buildRenderContext } from "./mapping.js";
import { resolveOutputPath, writeGeneratedFile } from "./output.js";
import { createTemplateRenderer, type TemplateRenderer } from "./render.js";
import type { GeneratedFile, GenerationContext, TableDesc } from "./types.js";

async function generateFile(
  context: GenerationContext,
  renderer: TemplateRenderer,
  table: TableDesc,
  className: string
): Promise<GeneratedFile> {
  const templateName = context.templateNameMapper(className);
  const outputDirectory = context.outputDirectoryMapper(className);
  const filePath = resolveOutputPath(outputDirectory, className, context.fileExtension);
  context.logger.info(
    `tableName = ${table.tableName}, templateName = ${templateName}, generate file = ${filePath}`
  );

  const primaryKeys = buildPrimaryKeyEntries(context.typeNameMapper, context.propertyNameMapper, table);
  const columns = buildColumnEntries(context.typeNameMapper, context.propertyNameMapper, table);
  const content = renderer.render(templateName, buildRenderContext(primaryKeys, columns, className));

  if (context.dryRun) {
    return { tableName: table.tableName, className, templateName, filePath, content, written: false };
  }

  await writeGeneratedFile(outputDirectory, className, content, context.fileExtension);
  return { tableName: table.tableName, className, templateName, filePath, content, written: true };
}

async function generateForTables(
  context: GenerationContext,
  tables: readonly TableDesc[]
): Promise<GeneratedFile[]> {
  const renderer = createTemplateRenderer(context.templateDirectory);
  const files: GeneratedFile[] = [];
  for (const table of tables) {
    for (const className of context.classNameMapper(table.tableName)) {
      files.push(await generateFile(context, renderer, table, className));
    }
  }
  return files;
}

async function readFilteredTables(context: GenerationContext): Promise<TableDesc[]> {
  const tables = await readAllTableDescs(context.connection, context.schemaName);
  warnOnDuplicateTables(context, tables);
  return tables.filter((table) => context.tableNameFilter(table.tableName));
}

// Without a schema name, a table name found in several schemas is read once per schema.
function warnOnDuplicateTables(context: GenerationContext, tables: readonly TableDesc[]): void {
  const seen = new Set<string>();
  const reported = new Set<string>();
  for (const { tableName } of tables) {
    if (seen.has(tableName) && !reported.has(tableName)) {
      reported.add(tableName);
      context.logger.warn(
        `Table ${tableName} exists in more than one schema; set a schema name to read only one of them`
      );
    }
    seen.add(tableName);
  }
}

export async function generateOne(
  context: GenerationContext,
  tableName: string
): Promise<GeneratedFile[]> {
  const tables = await readFilteredTables(context);
  const table = tables.find((candidate) => candidate.tableName === tableName);
  if (!table) {
    throw new TableNotFoundError(tableName);
  }
  return generateForTables(context, [table]);
}

/**
 * Generates files for the requested tables in schema order. Names that match
 * no table, or only a table rejected by the filter, are skipped with a warning.
 */
export async function generateMany(
  context: GenerationContext,
  tableNames: readonly string[]
): Promise<GeneratedFile[]> {
  const requested = new Set(tableNames);
  const tables = (await readFilteredTables(context)).filter((table) =>
    requested.has(table.tableName)
  );

  const found = new Set(tables.map((table) => table.tableName));
  for (const name of requested) {
    if (!found.has(name)) {
      context.logger.warn(`Skipping table not found or filtered out: ${name}`);
    }
  }

  return generateForTables(context, tables);
}

export async function generateAll(context: GenerationContext): Promise<GeneratedFile[]> {
  return generateForTables(context, await readFilteredTables(context));
}
