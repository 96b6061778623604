import { z } from 'zod';
import { CatalogSchemaError, type CatalogParseResult, type CatalogWarning } from './errors';
import {
  campusConfigFile,
  describeZodError,
  parseYamlDocument,
  readCatalogFile,
  type LoadCatalogOptions,
} from './io';

export interface PriceEntry {
  year?: string;
  perWeek?: number;
  total?: number;
}

export interface RoomType {
  name?: string;
  ensuite?: boolean;
  tenancyWeeks?: string;
  /** Chronological; the last entry is the current price. */
  prices: PriceEntry[];
}

export interface HallRecord {
  name: string;
  shortDescription?: string;
  address?: string;
  cateringType?: string;
  tags: string[];
  lifestyleTags: string[];
  facilities: string[];
  roomFeaturesCommon: string[];
  services: string[];
  roomTypes: RoomType[];
  officialUrl?: string;
  contactEmail?: string;
  contactPhone?: string;
}

export type KnowledgeCollection = 'halls';

// Individual fields degrade to "absent" instead of failing the record.
const optionalText = z.string().trim().min(1).optional().catch(undefined);

const textOrNumber = z
  .union([z.string().trim().min(1), z.number().finite().transform(String)])
  .optional()
  .catch(undefined);

const amount = z
  .union([
    z.number().finite(),
    z
      .string()
      .trim()
      .regex(/^£?\d+(?:\.\d+)?$/)
      .transform((value) => Number(value.replace('£', ''))),
  ])
  .optional()
  .catch(undefined);

const textList = z
  .union([z.string(), z.array(z.unknown())])
  .optional()
  .catch(undefined)
  .transform((value) => {
    if (value === undefined) {
      return [];
    }
    const items = typeof value === 'string' ? [value] : value;
    return items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter(Boolean);
  });

function listOf<T extends z.ZodTypeAny>(itemSchema: T) {
  return z
    .array(z.unknown())
    .optional()
    .catch(undefined)
    .transform((values) => {
      const parsed: Array<z.output<T>> = [];
      for (const value of values ?? []) {
        const item = itemSchema.safeParse(value);
        if (item.success) {
          parsed.push(item.data);
        }
      }
      return parsed;
    });
}

const priceSchema = z
  .object({
    year: textOrNumber,
    per_week: amount,
    per_week_amount: amount,
    total: amount,
    total_amount: amount,
  })
  .transform(
    (price): PriceEntry => ({
      year: price.year,
      perWeek: price.per_week_amount ?? price.per_week,
      total: price.total_amount ?? price.total,
    }),
  );

const roomTypeSchema = z
  .object({
    name: optionalText,
    ensuite: z.boolean().optional().catch(undefined),
    tenancy_weeks: textOrNumber,
    prices: listOf(priceSchema),
  })
  .transform(
    (room): RoomType => ({
      name: room.name,
      ensuite: room.ensuite,
      tenancyWeeks: room.tenancy_weeks,
      prices: room.prices,
    }),
  );

export const hallRecordSchema = z
  .object({
    name: z.string().trim().min(1),
    short_description: optionalText,
    address: optionalText,
    catering_type: optionalText,
    tags: textList,
    lifestyle_tags: textList,
    facilities: textList,
    room_features_common: textList,
    services: textList,
    room_types: listOf(roomTypeSchema),
    official_url: optionalText,
    contact_email: optionalText,
    contact_phone: textOrNumber,
  })
  .transform(
    (hall): HallRecord => ({
      name: hall.name,
      shortDescription: hall.short_description,
      address: hall.address,
      cateringType: hall.catering_type,
      tags: hall.tags,
      lifestyleTags: hall.lifestyle_tags,
      facilities: hall.facilities,
      roomFeaturesCommon: hall.room_features_common,
      services: hall.services,
      roomTypes: hall.room_types,
      officialUrl: hall.official_url,
      contactEmail: hall.contact_email,
      contactPhone: hall.contact_phone,
    }),
  );

export const hallsFileSchema = z.preprocess(
  (value) => (Array.isArray(value) ? { halls: value } : value),
  z.object({
    version: z.number().int().positive().default(1),
    halls: z.array(z.unknown()),
  }),
);

export interface HallCatalog {
  version: number;
  halls: HallRecord[];
}

/**
 * Parses `.campus-assist/halls.yaml`, either `{ version, halls: [...] }` or a
 * bare list of documents. Records keep file order; a record without a name is
 * skipped with a warning.
 */
export function parseHallsYaml(rawYaml: string, filePath = '.campus-assist/halls.yaml'): CatalogParseResult<HallCatalog> {
  const parsed = parseYamlDocument(rawYaml, filePath);
  // An empty document is an empty store.
  const result = hallsFileSchema.safeParse(parsed ?? { halls: [] });
  if (!result.success) {
    throw new CatalogSchemaError(filePath, describeZodError(result.error));
  }

  const warnings: CatalogWarning[] = [];
  const halls: HallRecord[] = [];
  result.data.halls.forEach((rawHall, index) => {
    const hall = hallRecordSchema.safeParse(rawHall);
    if (!hall.success) {
      warnings.push({ filePath, entry: `halls[${index}]`, message: describeZodError(hall.error) });
      return;
    }
    halls.push(hall.data);
  });

  return {
    catalog: { version: result.data.version, halls },
    warnings,
  };
}

export function loadHallCatalog(options: LoadCatalogOptions = {}): CatalogParseResult<HallCatalog> {
  const rootDir = options.rootDir ?? process.cwd();
  const filePath = campusConfigFile(rootDir, 'halls.yaml');
  return parseHallsYaml(readCatalogFile(filePath), filePath);
}
