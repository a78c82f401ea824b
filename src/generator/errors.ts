export class GeneratorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Driver could not be resolved or the connection handshake failed. */
export class ConnectionError extends GeneratorError {}

/** A metadata query failed or returned a row that cannot be read. */
export class SchemaReadError extends GeneratorError {}

/** A primary key names a column the table does not have. */
export class MappingError extends GeneratorError {}

export class TableNotFoundError extends GeneratorError {
  readonly tableName: string;

  constructor(tableName: string) {
    super(`Table not found: ${tableName}`);
    this.tableName = tableName;
  }
}

export class TemplateError extends GeneratorError {
  readonly templateName: string;

  constructor(templateName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.templateName = templateName;
  }
}

export class IOError extends GeneratorError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.filePath = filePath;
  }
}

export class ConfigError extends GeneratorError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
