import { mkdtempSync, mkdirSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import assert from 'node:assert/strict';
import test from 'node:test';
import {
  CatalogIoError,
  CatalogSchemaError,
  isMissingFileError,
  loadGazetteer,
  loadIntentCatalog,
  parseGazetteerYaml,
  parseHallsYaml,
  parseIntentsYaml,
} from './index';

function writeFixtureCatalog(files: Record<string, string>): string {
  const rootDir = mkdtempSync(path.join(tmpdir(), 'campus-assist-catalog-'));
  const configDir = path.join(rootDir, '.campus-assist');
  mkdirSync(configDir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(path.join(configDir, name), content, 'utf8');
  }
  return rootDir;
}

test('parseIntentsYaml keeps file order and accepts string or object patterns', () => {
  const { catalog, warnings } = parseIntentsYaml(`version: 1
intents:
  - intent: ask_location
    patterns:
      - '\\bwhere is\\b'
      - regex: '\\blocation of\\b'
        flags: [IGNORECASE]
  - _id: ask_library
    patterns:
      - regex: 'library'
        flags: MULTILINE
`);

  assert.deepEqual(warnings, []);
  assert.deepEqual(catalog.intents, [
    {
      intent: 'ask_location',
      patterns: [
        { regex: '\\bwhere is\\b', flags: [] },
        { regex: '\\blocation of\\b', flags: ['IGNORECASE'] },
      ],
    },
    { intent: 'ask_library', patterns: [{ regex: 'library', flags: ['MULTILINE'] }] },
  ]);
});

test('parseIntentsYaml skips malformed entries with warnings', () => {
  const { catalog, warnings } = parseIntentsYaml(`intents:
  - patterns: ['orphan']
  - intent: ask_time
    patterns:
      - regex: 'when is'
        flags: [UNICODE]
      - 'opening hours'
  - intent: ask_fees
    patterns: []
`);

  assert.equal(catalog.version, 1);
  assert.deepEqual(catalog.intents, [{ intent: 'ask_time', patterns: [{ regex: 'opening hours', flags: [] }] }]);
  assert.deepEqual(
    warnings.map((warning) => warning.entry),
    ['intents[0]', 'intents[1].patterns[0]', 'intents[2]'],
  );
});

test('parseIntentsYaml rejects a file without an intents list', () => {
  assert.throws(() => parseIntentsYaml('version: 1\nrules: []\n'), CatalogSchemaError);
  assert.throws(() => parseIntentsYaml('intents: [unclosed'), /YAML syntax error/);
});

test('parseGazetteerYaml merges aliases for repeated canonical values', () => {
  const { catalog, warnings } = parseGazetteerYaml(`slots:
  - slot: building
    items:
      - canonical: main library
        aliases: [library, the lib]
      - aliases: [no canonical here]
      - canonical: main library
        aliases: [library, learning hub]
  - _id: hall
    items:
      - canonical: Butler Court
        aliases: [butler]
`);

  assert.equal(warnings.length, 1);
  assert.equal(warnings[0]?.entry, 'slots[0].items[1]');
  assert.deepEqual(catalog.slots, [
    { slot: 'building', entries: [{ canonical: 'main library', aliases: ['library', 'the lib', 'learning hub'] }] },
    { slot: 'hall', entries: [{ canonical: 'Butler Court', aliases: ['butler'] }] },
  ]);
});

test('parseGazetteerYaml accepts the map layout', () => {
  const { catalog } = parseGazetteerYaml(`slots:
  service:
    it service desk: [it desk, helpdesk]
    student finance: []
  building:
    - canonical: sports centre
      aliases: [gym]
`);

  assert.deepEqual(catalog.slots, [
    {
      slot: 'service',
      entries: [
        { canonical: 'it service desk', aliases: ['it desk', 'helpdesk'] },
        { canonical: 'student finance', aliases: [] },
      ],
    },
    { slot: 'building', entries: [{ canonical: 'sports centre', aliases: ['gym'] }] },
  ]);
});

test('parseHallsYaml maps snake_case documents and degrades malformed fields', () => {
  const { catalog, warnings } = parseHallsYaml(`halls:
  - name: Test Court
    short_description: A test hall.
    catering_type: 42
    tags: budget
    lifestyle_tags: [social, 7, '']
    room_types:
      - name: Standard
        ensuite: 'yes'
        tenancy_weeks: 43
        prices:
          - year: 2024/25
            per_week_amount: 150
            total_amount: '6450.00'
          - year: 2025
          - not a price
    contact_phone: 1234
  - short_description: nameless
`);

  assert.equal(warnings.length, 1);
  assert.equal(warnings[0]?.entry, 'halls[1]');
  assert.deepEqual(catalog.halls, [
    {
      name: 'Test Court',
      shortDescription: 'A test hall.',
      address: undefined,
      cateringType: undefined,
      tags: ['budget'],
      lifestyleTags: ['social'],
      facilities: [],
      roomFeaturesCommon: [],
      services: [],
      roomTypes: [
        {
          name: 'Standard',
          ensuite: undefined,
          tenancyWeeks: '43',
          prices: [
            { year: '2024/25', perWeek: 150, total: 6450 },
            { year: '2025', perWeek: undefined, total: undefined },
          ],
        },
      ],
      officialUrl: undefined,
      contactEmail: undefined,
      contactPhone: '1234',
    },
  ]);
});

test('parseHallsYaml treats an empty document as an empty store', () => {
  assert.deepEqual(parseHallsYaml('').catalog.halls, []);
  assert.deepEqual(parseHallsYaml('- name: Listed Hall\n').catalog.halls.map((hall) => hall.name), ['Listed Hall']);
});

test('loaders read from the .campus-assist directory', () => {
  const rootDir = writeFixtureCatalog({
    'intents.yaml': "intents:\n  - intent: ask_library\n    patterns: ['library']\n",
    'gazetteer.yaml': 'slots: []\n',
  });

  assert.equal(loadIntentCatalog({ rootDir }).catalog.intents[0]?.intent, 'ask_library');
  assert.deepEqual(loadGazetteer({ rootDir }).catalog.slots, []);
});

test('loaders raise CatalogIoError for missing files', () => {
  const rootDir = writeFixtureCatalog({});

  assert.throws(
    () => loadIntentCatalog({ rootDir }),
    (error: unknown) => {
      assert.ok(error instanceof CatalogIoError);
      assert.equal(isMissingFileError(error), true);
      return true;
    },
  );
});
