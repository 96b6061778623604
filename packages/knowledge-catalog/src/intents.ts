import { z } from 'zod';
import { CatalogSchemaError, type CatalogParseResult, type CatalogWarning } from './errors';
import {
  campusConfigFile,
  describeZodError,
  parseYamlDocument,
  readCatalogFile,
  type LoadCatalogOptions,
} from './io';

export const patternFlagSchema = z.enum(['IGNORECASE', 'MULTILINE', 'DOTALL']);
export type PatternFlag = z.infer<typeof patternFlagSchema>;

export interface IntentPatternEntry {
  regex: string;
  flags: PatternFlag[];
}

const patternEntrySchema = z.union([
  z
    .string()
    .min(1)
    .transform((regex): IntentPatternEntry => ({ regex, flags: [] })),
  z.object({
    regex: z.string().min(1),
    flags: z
      .union([patternFlagSchema.transform((flag) => [flag]), z.array(patternFlagSchema)])
      .default([]),
  }),
]);

const intentEntrySchema = z
  .object({
    intent: z.string().trim().min(1).optional(),
    _id: z.string().trim().min(1).optional(),
    patterns: z.array(z.unknown()),
  })
  .refine((entry) => entry.intent !== undefined || entry._id !== undefined, {
    message: 'intent (or _id) is required',
  });

export const intentsFileSchema = z.object({
  version: z.number().int().positive().default(1),
  intents: z.array(z.unknown()),
});

export interface IntentDefinition {
  intent: string;
  patterns: IntentPatternEntry[];
}

export interface IntentCatalog {
  version: number;
  intents: IntentDefinition[];
}

/**
 * Parses `.campus-assist/intents.yaml`. File order is significant: intent
 * blocks and the patterns inside them keep the order they were written in.
 */
export function parseIntentsYaml(
  rawYaml: string,
  filePath = '.campus-assist/intents.yaml',
): CatalogParseResult<IntentCatalog> {
  const parsed = parseYamlDocument(rawYaml, filePath);
  const result = intentsFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new CatalogSchemaError(filePath, describeZodError(result.error));
  }

  const warnings: CatalogWarning[] = [];
  const intents: IntentDefinition[] = [];

  result.data.intents.forEach((rawEntry, index) => {
    const entry = intentEntrySchema.safeParse(rawEntry);
    if (!entry.success) {
      warnings.push({ filePath, entry: `intents[${index}]`, message: describeZodError(entry.error) });
      return;
    }

    const label = entry.data.intent ?? entry.data._id ?? '';
    const patterns: IntentPatternEntry[] = [];
    entry.data.patterns.forEach((rawPattern, patternIndex) => {
      const pattern = patternEntrySchema.safeParse(rawPattern);
      if (!pattern.success) {
        warnings.push({
          filePath,
          entry: `intents[${index}].patterns[${patternIndex}]`,
          message: describeZodError(pattern.error),
        });
        return;
      }
      patterns.push(pattern.data);
    });

    if (patterns.length === 0) {
      warnings.push({ filePath, entry: `intents[${index}]`, message: `intent '${label}' has no usable patterns` });
      return;
    }

    intents.push({ intent: label, patterns });
  });

  return {
    catalog: { version: result.data.version, intents },
    warnings,
  };
}

export function loadIntentCatalog(options: LoadCatalogOptions = {}): CatalogParseResult<IntentCatalog> {
  const rootDir = options.rootDir ?? process.cwd();
  const filePath = campusConfigFile(rootDir, 'intents.yaml');
  return parseIntentsYaml(readCatalogFile(filePath), filePath);
}
