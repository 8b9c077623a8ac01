/**
 * Null-safe navigation over parsed JSON-LD blocks.
 *
 * Listing pages carry several ld+json blocks (the offer itself, a breadcrumb
 * list, the agent). Everything that reads them goes through getPath so a
 * missing key yields null instead of a TypeError.
 */

export type PathSegment = string | number;

export interface StructuredFields {
  price: unknown;
  province: string | null;
  neighbourhood: string | null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getPath(value: unknown, path: readonly PathSegment[]): unknown {
  let current: unknown = value;

  for (const segment of path) {
    if (typeof segment === 'number') {
      if (!Array.isArray(current) || segment < 0 || segment >= current.length) return null;
      current = current[segment];
    } else {
      if (!isRecord(current) || !Object.hasOwn(current, segment)) return null;
      current = current[segment];
    }
  }

  return current ?? null;
}

/**
 * Like getPath, but only a non-blank string counts as a value
 */
export function getString(value: unknown, path: readonly PathSegment[]): string | null {
  const found = getPath(value, path);
  if (typeof found !== 'string') return null;
  const trimmed = found.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Neighbourhood is the third crumb of the page's BreadcrumbList
 * (home > city > neighbourhood > street). This is a positional heuristic:
 * nothing in the markup says the crumb is a neighbourhood, so a layout change
 * upstream silently yields the wrong crumb.
 */
export function getNeighbourhood(block: unknown): string | null {
  return getString(block, ['itemListElement', 2, 'item', 'name']);
}

function getOfferPrice(block: unknown): unknown {
  return getPath(block, ['offers', 'price']) ?? getPath(block, ['offers', 0, 'price']);
}

/**
 * Folds all blocks in document order. A value found in a later block replaces
 * one from an earlier block, so the result depends on block order.
 */
export function mergeStructuredData(blocks: readonly unknown[]): StructuredFields {
  const merged: StructuredFields = { price: null, province: null, neighbourhood: null };

  // A block may itself be an array of entities
  const entities = blocks.flatMap(block => (Array.isArray(block) ? block : [block]));

  for (const entity of entities) {
    const price = getOfferPrice(entity);
    if (price !== null) merged.price = price;

    const province = getString(entity, ['address', 'addressRegion']);
    if (province !== null) merged.province = province;

    const neighbourhood = getNeighbourhood(entity);
    if (neighbourhood !== null) merged.neighbourhood = neighbourhood;
  }

  return merged;
}
