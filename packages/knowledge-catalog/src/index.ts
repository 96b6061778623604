export { CatalogIoError, CatalogSchemaError, type CatalogParseResult, type CatalogWarning } from './errors';
export {
  CATALOG_DIR,
  campusConfigFile,
  isMissingFileError,
  readCatalogFile,
  type LoadCatalogOptions,
} from './io';
export {
  intentsFileSchema,
  loadIntentCatalog,
  parseIntentsYaml,
  patternFlagSchema,
  type IntentCatalog,
  type IntentDefinition,
  type IntentPatternEntry,
  type PatternFlag,
} from './intents';
export {
  gazetteerFileSchema,
  loadGazetteer,
  parseGazetteerYaml,
  type GazetteerCatalog,
  type GazetteerEntry,
  type GazetteerSlot,
} from './gazetteer';
export {
  hallRecordSchema,
  hallsFileSchema,
  loadHallCatalog,
  parseHallsYaml,
  type HallCatalog,
  type HallRecord,
  type KnowledgeCollection,
  type PriceEntry,
  type RoomType,
} from './halls';
