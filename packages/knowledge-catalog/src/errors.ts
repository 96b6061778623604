export class CatalogSchemaError extends Error {
  constructor(public readonly filePath: string, message: string) {
    super(`Invalid catalog schema in ${filePath}: ${message}`);
    this.name = 'CatalogSchemaError';
  }
}

export class CatalogIoError extends Error {
  constructor(public readonly filePath: string, cause: unknown) {
    super(`Failed to read catalog file ${filePath}`);
    this.name = 'CatalogIoError';
    this.cause = cause;
  }

  declare cause: unknown;
}

/**
 * A malformed entry that was skipped while loading a catalog file. Loading
 * continues; callers decide whether to log or surface these.
 */
export interface CatalogWarning {
  filePath: string;
  entry: string;
  message: string;
}

export interface CatalogParseResult<T> {
  catalog: T;
  warnings: CatalogWarning[];
}
