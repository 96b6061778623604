import { readFileSync } from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import type { ZodError } from 'zod';
import { CatalogIoError, CatalogSchemaError } from './errors';

export const CATALOG_DIR = '.campus-assist';

export interface LoadCatalogOptions {
  rootDir?: string;
}

export function campusConfigFile(rootDir: string, fileName: string): string {
  return path.join(rootDir, CATALOG_DIR, fileName);
}

export function readCatalogFile(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new CatalogIoError(filePath, error);
  }
}

export function parseYamlDocument(rawYaml: string, filePath: string): unknown {
  try {
    return YAML.parse(rawYaml);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CatalogSchemaError(filePath, `YAML syntax error: ${message}`);
  }
}

export function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function isMissingFileError(error: unknown): boolean {
  const cause = error instanceof CatalogIoError ? error.cause : error;
  return cause instanceof Error && 'code' in cause && cause.code === 'ENOENT';
}
