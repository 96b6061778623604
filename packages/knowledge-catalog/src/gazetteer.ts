import { z } from 'zod';
import { CatalogSchemaError, type CatalogParseResult, type CatalogWarning } from './errors';
import {
  campusConfigFile,
  describeZodError,
  parseYamlDocument,
  readCatalogFile,
  type LoadCatalogOptions,
} from './io';

const aliasListSchema = z
  .array(z.unknown())
  .default([])
  .transform((values) =>
    values.filter((value): value is string => typeof value === 'string').map((value) => value.trim()).filter(Boolean),
  );

const gazetteerItemSchema = z.object({
  canonical: z.string().trim().min(1),
  aliases: aliasListSchema,
});

const slotBlockSchema = z
  .object({
    slot: z.string().trim().min(1).optional(),
    _id: z.string().trim().min(1).optional(),
    items: z.array(z.unknown()),
  })
  .refine((block) => block.slot !== undefined || block._id !== undefined, {
    message: 'slot (or _id) is required',
  });

export const gazetteerFileSchema = z.object({
  version: z.number().int().positive().default(1),
  slots: z.union([z.array(z.unknown()), z.record(z.unknown())]),
});

export interface GazetteerEntry {
  canonical: string;
  aliases: string[];
}

export interface GazetteerSlot {
  slot: string;
  entries: GazetteerEntry[];
}

export interface GazetteerCatalog {
  version: number;
  slots: GazetteerSlot[];
}

class GazetteerBuilder {
  private readonly slots = new Map<string, Map<string, string[]>>();

  add(slot: string, item: GazetteerEntry): void {
    let entries = this.slots.get(slot);
    if (!entries) {
      entries = new Map();
      this.slots.set(slot, entries);
    }

    const aliases = entries.get(item.canonical) ?? [];
    for (const alias of item.aliases) {
      if (!aliases.includes(alias)) {
        aliases.push(alias);
      }
    }
    entries.set(item.canonical, aliases);
  }

  touch(slot: string): void {
    if (!this.slots.has(slot)) {
      this.slots.set(slot, new Map());
    }
  }

  build(): GazetteerSlot[] {
    return [...this.slots.entries()].map(([slot, entries]) => ({
      slot,
      entries: [...entries.entries()].map(([canonical, aliases]) => ({ canonical, aliases })),
    }));
  }
}

/**
 * Parses `.campus-assist/gazetteer.yaml`. Two layouts are accepted:
 *
 * ```yaml
 * slots:
 *   - slot: building
 *     items:
 *       - canonical: main library
 *         aliases: [library, the lib]
 * ```
 *
 * or a map keyed by slot type whose values are either item lists or
 * `canonical: [aliases]` maps. Items without a canonical value are skipped,
 * and repeated canonical values merge their aliases.
 */
export function parseGazetteerYaml(
  rawYaml: string,
  filePath = '.campus-assist/gazetteer.yaml',
): CatalogParseResult<GazetteerCatalog> {
  const parsed = parseYamlDocument(rawYaml, filePath);
  const result = gazetteerFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new CatalogSchemaError(filePath, describeZodError(result.error));
  }

  const warnings: CatalogWarning[] = [];
  const builder = new GazetteerBuilder();

  const addItems = (slot: string, items: unknown[], label: string): void => {
    builder.touch(slot);
    items.forEach((rawItem, index) => {
      const item = gazetteerItemSchema.safeParse(rawItem);
      if (!item.success) {
        warnings.push({ filePath, entry: `${label}.items[${index}]`, message: describeZodError(item.error) });
        return;
      }
      builder.add(slot, item.data);
    });
  };

  const { slots } = result.data;
  if (Array.isArray(slots)) {
    slots.forEach((rawBlock, index) => {
      const block = slotBlockSchema.safeParse(rawBlock);
      if (!block.success) {
        warnings.push({ filePath, entry: `slots[${index}]`, message: describeZodError(block.error) });
        return;
      }
      const slot = block.data.slot ?? block.data._id ?? '';
      addItems(slot, block.data.items, `slots[${index}]`);
    });
  } else {
    for (const [slot, value] of Object.entries(slots)) {
      const label = `slots.${slot}`;
      if (Array.isArray(value)) {
        addItems(slot, value, label);
        continue;
      }

      const aliasMap = z.record(aliasListSchema).safeParse(value);
      if (!aliasMap.success) {
        warnings.push({ filePath, entry: label, message: describeZodError(aliasMap.error) });
        continue;
      }
      addItems(
        slot,
        Object.entries(aliasMap.data).map(([canonical, aliases]) => ({ canonical, aliases })),
        label,
      );
    }
  }

  return {
    catalog: { version: result.data.version, slots: builder.build() },
    warnings,
  };
}

export function loadGazetteer(options: LoadCatalogOptions = {}): CatalogParseResult<GazetteerCatalog> {
  const rootDir = options.rootDir ?? process.cwd();
  const filePath = campusConfigFile(rootDir, 'gazetteer.yaml');
  return parseGazetteerYaml(readCatalogFile(filePath), filePath);
}
