import { readFileSync } from 'fs';
import { load } from 'cheerio';
import { describe, expect, it } from 'vitest';
import { StructuredDataError } from '../errors';
import {
  collectStructuredData,
  extractDeepToken,
  extractFeatureTable,
  extractStructuredData,
  extractTitle,
  flattenTokens,
  parseDocument,
} from './document-parser';

const fixture = readFileSync(new URL('./__fixtures__/funda-listing.html', import.meta.url), 'utf8');

describe('extractFeatureTable', () => {
  it('maps every label under each heading to its value', () => {
    expect(extractFeatureTable(load(fixture))).toEqual({
      'Vraagprijs': '€ 450.000 k.k.',
      'Status': 'Beschikbaar',
      'Soort woonhuis': 'Eengezinswoning, tussenwoning',
      'Bouwjaar': '1930',
      'Wonen': '120 m²',
      'Aantal kamers': '5 kamers (4 slaapkamers)',
      'Energielabel': 'C',
    });
  });

  it('returns the same mapping when parsing the same html twice', () => {
    expect(extractFeatureTable(load(fixture))).toEqual(extractFeatureTable(load(fixture)));
  });

  it('lets a later section overwrite a repeated label', () => {
    const $ = load(`
      <h3>Buiten</h3><dl><dt>Ligging</dt><dd>Aan rustige weg</dd></dl>
      <h3>Garage</h3><dl><dt>Ligging</dt><dd>Inpandig</dd></dl>
    `);
    expect(extractFeatureTable($)).toEqual({ Ligging: 'Inpandig' });
  });

  it('takes the list after the heading even when it is not a sibling', () => {
    const $ = load('<div><h3>Bouw</h3></div><div><dl><dt>Bouwjaar</dt><dd>1999</dd></dl></div>');
    expect(extractFeatureTable($)).toEqual({ Bouwjaar: '1999' });
  });

  it('is empty without headings', () => {
    expect(extractFeatureTable(load('<dl><dt>Bouwjaar</dt><dd>1999</dd></dl>'))).toEqual({});
  });
});

describe('extractStructuredData', () => {
  it('parses every ld+json block in order', () => {
    const blocks = extractStructuredData(load(fixture));
    expect(blocks).toHaveLength(2);
    expect(blocks[1]).toMatchObject({ '@type': 'BreadcrumbList' });
  });

  it('returns an empty list when there are no blocks', () => {
    expect(extractStructuredData(load('<html><head></head></html>'))).toEqual([]);
  });

  it('names the block that is not valid json', () => {
    const $ = load(`
      <script type="application/ld+json">{"ok": true}</script>
      <script type="application/ld+json">{"broken": </script>
    `);
    expect(() => extractStructuredData($)).toThrow(StructuredDataError);
    expect(() => extractStructuredData($)).toThrow(/block #2/);
  });
});

describe('collectStructuredData', () => {
  it('keeps the blocks that parse and reports each broken one', () => {
    const { blocks, errors } = collectStructuredData(load(`
      <script type="application/ld+json">{"offers": {"price": 300000}}</script>
      <script type="application/ld+json">{"broken": </script>
      <script type="application/ld+json">{"name": "third"}</script>
    `));

    expect(blocks).toEqual([{ offers: { price: 300000 } }, { name: 'third' }]);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(StructuredDataError);
    expect(errors[0].message).toMatch(/^Failed to parse JSON-LD block #2: /);
  });
});

describe('extractTitle', () => {
  it('returns the title text verbatim', () => {
    expect(extractTitle(load(fixture))).toBe('Huis te koop: Vondellaan 26 2332 AA Leiden [funda]');
  });

  it('returns null without a title element', () => {
    expect(extractTitle(load('<p>no title</p>'))).toBeNull();
  });
});

describe('flattenTokens', () => {
  it('flattens one level and stringifies everything', () => {
    expect(flattenTokens(['a', 1, true, null, ['b', 2, { c: 3 }], { d: 'e', f: [4] }])).toEqual([
      'a', '1', 'true', 'null', 'b', '2', '{"c":3}', 'e', '[4]',
    ]);
  });
});

describe('extractDeepToken', () => {
  it('returns the value two positions after the sentinel', () => {
    expect(extractDeepToken(load(fixture))).toBe('2024-03-15T09:30:00');
  });

  it('returns null when the sentinel is missing', () => {
    const $ = load('<script type="application/json" id="__NUXT_DATA__">["a","b","c"]</script>');
    expect(extractDeepToken($)).toBeNull();
  });

  it('returns null when the payload script is missing', () => {
    expect(extractDeepToken(load('<p></p>'))).toBeNull();
  });

  it('returns null when the sentinel is too close to the end', () => {
    const $ = load('<script type="application/json" id="__NUXT_DATA__">["publicationDate","x"]</script>');
    expect(extractDeepToken($)).toBeNull();
  });

  it('accepts a custom script id, sentinel and offset', () => {
    const $ = load('<script id="app-state">["x","marker","value"]</script>');
    expect(extractDeepToken($, { scriptId: 'app-state', sentinel: 'marker', offset: 1 })).toBe('value');
  });
});

describe('parseDocument', () => {
  it('collects all parts of a listing page', () => {
    const doc = parseDocument(fixture);
    expect(doc.title).toBe('Huis te koop: Vondellaan 26 2332 AA Leiden [funda]');
    expect(doc.structuredData).toHaveLength(2);
    expect(doc.featureTable['Wonen']).toBe('120 m²');
    expect(doc.listingDate).toBe('2024-03-15T09:30:00');
    expect(doc.warnings).toEqual([]);
  });

  it('keeps the other parts when one part is broken', () => {
    const doc = parseDocument(`
      <title>Koop: Dorpsstraat 1 1234AB Amsterdam</title>
      <script type="application/ld+json">{not json</script>
      <script type="application/json" id="__NUXT_DATA__">[oops</script>
      <h3>Bouw</h3><dl><dt>Bouwjaar</dt><dd>1999</dd></dl>
    `);
    expect(doc.structuredData).toEqual([]);
    expect(doc.listingDate).toBeNull();
    expect(doc.title).toBe('Koop: Dorpsstraat 1 1234AB Amsterdam');
    expect(doc.featureTable).toEqual({ Bouwjaar: '1999' });
    expect(doc.warnings).toHaveLength(2);
    expect(doc.warnings[0]).toMatch(/^structured data: Failed to parse JSON-LD block #1/);
    expect(doc.warnings[1]).toMatch(/^listing date: Failed to parse __NUXT_DATA__ payload/);
  });

  it('keeps the offer block when another ld+json block is broken', () => {
    const doc = parseDocument(`
      <script type="application/ld+json">{"offers": {"price": 300000}}</script>
      <script type="application/ld+json">{"broken": </script>
    `);
    expect(doc.structuredData).toEqual([{ offers: { price: 300000 } }]);
    expect(doc.warnings).toHaveLength(1);
    expect(doc.warnings[0]).toMatch(/^structured data: Failed to parse JSON-LD block #2: /);
  });

  it('degrades to empty parts for a page without markup', () => {
    const doc = parseDocument('just some text');
    expect(doc).toEqual({
      structuredData: [],
      featureTable: {},
      title: null,
      listingDate: null,
      warnings: [],
    });
  });
});
