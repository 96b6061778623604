import {
  isMissingFileError,
  loadHallCatalog,
  type CatalogParseResult,
  type HallCatalog,
  type HallRecord,
  type KnowledgeCollection,
} from '@campus-assist/knowledge-catalog';
import type { Logger } from '../logging';

export interface KnowledgeStoreReader {
  readonly id: string;
  fetchAllRecords(collection: KnowledgeCollection): Promise<HallRecord[]>;
}

export interface YamlKnowledgeStoreOptions {
  rootDir: string;
  logger: Logger;
}

/**
 * Reads `.campus-assist/halls.yaml` on every call, so edits show up without
 * a restart. A missing file is an empty collection.
 */
export class YamlKnowledgeStore implements KnowledgeStoreReader {
  readonly id = 'yaml';

  constructor(private readonly options: YamlKnowledgeStoreOptions) {}

  async fetchAllRecords(collection: KnowledgeCollection): Promise<HallRecord[]> {
    let loaded: CatalogParseResult<HallCatalog>;
    try {
      loaded = loadHallCatalog({ rootDir: this.options.rootDir });
    } catch (error) {
      if (isMissingFileError(error)) {
        this.options.logger.debug('store.collection.missing', { collection });
        return [];
      }
      throw error;
    }

    for (const warning of loaded.warnings) {
      this.options.logger.warn('store.record.skipped', { collection, ...warning });
    }
    return loaded.catalog.halls;
  }
}

export class InMemoryKnowledgeStore implements KnowledgeStoreReader {
  readonly id = 'memory';
  private readonly collections: Record<KnowledgeCollection, readonly HallRecord[]>;

  constructor(halls: readonly HallRecord[] = []) {
    this.collections = { halls };
  }

  async fetchAllRecords(collection: KnowledgeCollection): Promise<HallRecord[]> {
    return [...this.collections[collection]];
  }
}
