import { load, type CheerioAPI } from 'cheerio';
import type { FeatureTable } from '@shared/schema';
import { StructuredDataError, getErrorMessage } from '../errors';
import { isRecord } from './structured-data';

// ============================================
// INTERFACES
// ============================================

export interface DeepTokenOptions {
  scriptId?: string;
  sentinel?: string;
  offset?: number;
}

export interface ParsedDocument {
  structuredData: unknown[];
  featureTable: FeatureTable;
  title: string | null;
  listingDate: string | null;
  warnings: string[];
}

export const APP_DATA_SCRIPT_ID = '__NUXT_DATA__';
export const LISTING_DATE_SENTINEL = 'publicationDate';
export const LISTING_DATE_OFFSET = 2;

// ============================================
// STRUCTURED DATA (JSON-LD)
// ============================================

export interface StructuredDataBlocks {
  blocks: unknown[];
  errors: StructuredDataError[];
}

/**
 * Parses every <script type="application/ld+json"> block on its own and keeps
 * the ones that parse. Each broken block yields one error naming it.
 */
export function collectStructuredData($: CheerioAPI): StructuredDataBlocks {
  const result: StructuredDataBlocks = { blocks: [], errors: [] };

  $('script[type="application/ld+json"]').each((index, el) => {
    const raw = $(el).html() ?? '';
    try {
      result.blocks.push(JSON.parse(raw));
    } catch (error) {
      result.errors.push(
        new StructuredDataError(`Failed to parse JSON-LD block #${index + 1}: ${getErrorMessage(error)}`),
      );
    }
  });

  return result;
}

/**
 * Strict variant: no blocks gives an empty list, a block that is not valid
 * JSON throws.
 */
export function extractStructuredData($: CheerioAPI): unknown[] {
  const { blocks, errors } = collectStructuredData($);
  if (errors.length > 0) {
    throw errors[0];
  }
  return blocks;
}

// ============================================
// FEATURE TABLE (<h3> + <dl>)
// ============================================

/**
 * Maps <dt> label → <dd> value for the definition list following each <h3>.
 * A <span> inside the <dd> wins over the full <dd> text (which also holds
 * tooltips and formatting wrappers). Labels repeat across sections; the last
 * section wins.
 */
export function extractFeatureTable($: CheerioAPI): FeatureTable {
  // cheerio has no find_next, so compare positions in document order instead
  const order = new Map<unknown, number>();
  $('*').each((index, el) => {
    order.set(el, index);
  });
  const position = (el: unknown) => order.get(el) ?? -1;

  const lists = $('dl').toArray();
  const definitions = $('dd').toArray();
  const table: FeatureTable = {};

  $('h3').each((_, heading) => {
    const headingPosition = position(heading);
    const list = lists.find(candidate => position(candidate) > headingPosition);
    if (!list) return;

    $(list).find('dt').each((_, term) => {
      const termPosition = position(term);
      const definition = definitions.find(candidate => position(candidate) > termPosition);
      if (!definition) return;

      const key = $(term).text().trim();
      const span = $(definition).find('span').first();
      table[key] = span.length > 0 ? span.text().trim() : $(definition).text().trim();
    });
  });

  return table;
}

// ============================================
// TITLE
// ============================================

export function extractTitle($: CheerioAPI): string | null {
  const title = $('title').first();
  return title.length > 0 ? title.text() : null;
}

// ============================================
// APPLICATION DATA (deep token)
// ============================================

function toToken(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Flattens one level: scalars become strings, nested arrays and objects
 * contribute each of their elements (or values) as a string, in order.
 */
export function flattenTokens(items: readonly unknown[]): string[] {
  const tokens: string[] = [];

  for (const item of items) {
    if (Array.isArray(item)) {
      for (const nested of item) tokens.push(toToken(nested));
    } else if (isRecord(item)) {
      for (const nested of Object.values(item)) tokens.push(toToken(nested));
    } else {
      tokens.push(toToken(item));
    }
  }

  return tokens;
}

/**
 * The app payload is one large JSON array; the value we want sits a fixed
 * number of positions after a sentinel token.
 */
export function extractDeepToken($: CheerioAPI, options: DeepTokenOptions = {}): string | null {
  const scriptId = options.scriptId ?? APP_DATA_SCRIPT_ID;
  const sentinel = options.sentinel ?? LISTING_DATE_SENTINEL;
  const offset = options.offset ?? LISTING_DATE_OFFSET;

  const raw = $(`script[id="${scriptId}"]`).first().html();
  if (!raw) return null;

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new StructuredDataError(`Failed to parse ${scriptId} payload: ${getErrorMessage(error)}`);
  }
  if (!Array.isArray(data)) return null;

  const tokens = flattenTokens(data);
  const index = tokens.indexOf(sentinel);
  if (index === -1) return null;

  return tokens[index + offset] ?? null;
}

// ============================================
// WHOLE DOCUMENT
// ============================================

/**
 * Runs every part extractor over one page. A part that fails is reported in
 * warnings and left empty; the other parts are still returned. Structured
 * data is handled per block.
 */
export function parseDocument(html: string, deepToken: DeepTokenOptions = {}): ParsedDocument {
  const warnings: string[] = [];
  const $ = load(html);

  const attempt = <T>(label: string, fallback: T, run: () => T): T => {
    try {
      return run();
    } catch (error) {
      warnings.push(`${label}: ${getErrorMessage(error)}`);
      return fallback;
    }
  };

  // A broken block costs only itself, the parsed ones are kept
  const { blocks, errors } = collectStructuredData($);
  for (const error of errors) {
    warnings.push(`structured data: ${error.message}`);
  }

  return {
    structuredData: blocks,
    featureTable: attempt<FeatureTable>('feature table', {}, () => extractFeatureTable($)),
    title: attempt<string | null>('title', null, () => extractTitle($)),
    listingDate: attempt<string | null>('listing date', null, () => extractDeepToken($, deepToken)),
    warnings,
  };
}
