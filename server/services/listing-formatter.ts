import type { Listing } from '@shared/schema';

function row(label: string, value: string | number | null | undefined): string {
  return `  ${(label + ':').padEnd(15)}${value ?? '-'}`;
}

function euro(value: number): string {
  return `€ ${value.toLocaleString('nl-NL', { maximumFractionDigits: 0 })}`;
}

/**
 * Plain-text block for one listing, as printed by the scrape run
 */
export function formatListing(listing: Listing): string {
  const { address, property, price } = listing;

  const heading = address
    ? `${address.street} ${address.number}, ${address.zip_code} ${address.city}`
    : 'Unknown address';

  const propertyType = property?.property_type
    ? `${property.property_type}${listing.house_type ? ` (${listing.house_type})` : ''}`
    : null;

  return [
    heading,
    row('Url', listing.url),
    row('Source', listing.source),
    row('Neighbourhood', address?.neighbourhood),
    row('Province', address?.province),
    row('Status', listing.status),
    row('Listed since', listing.listing_date),
    row('Asking price', price?.asking_price ? euro(price.asking_price) : null),
    row('Price per m²', price?.asking_price_per_square_meter ? euro(price.asking_price_per_square_meter) : null),
    row('Type', propertyType),
    row('Living area', property?.living_area ? `${property.living_area} m²` : null),
    row('Rooms', property?.num_rooms),
    row('Build year', property?.build_year),
    row('Energy label', property?.energy_label),
  ].join('\n');
}
