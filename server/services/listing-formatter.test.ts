import type { Listing } from '@shared/schema';
import { describe, expect, it } from 'vitest';
import { formatListing } from './listing-formatter';

const listing: Listing = {
  address: {
    street: 'Vondellaan',
    number: '26',
    zip_code: '2332AA',
    city: 'Leiden',
    neighbourhood: 'Professorenwijk-Oost',
    province: 'Zuid-Holland',
    country: 'The Netherlands',
  },
  property: {
    energy_label: 'C',
    living_area: 120,
    num_rooms: 5,
    build_year: 1930,
    property_type: 'Eengezinswoning',
  },
  price: { asking_price: 450000, asking_price_per_square_meter: 3750, sale_price: null },
  status: 'Beschikbaar',
  listing_date: '2024-03-15T09:30:00',
  house_type: 'House',
  source: 'funda',
  url: 'https://www.funda.nl/detail/koop/leiden/huis-vondellaan-26/43889182/',
};

describe('formatListing', () => {
  it('prints one labelled line per field', () => {
    expect(formatListing(listing).split('\n')).toEqual([
      'Vondellaan 26, 2332AA Leiden',
      '  Url:           https://www.funda.nl/detail/koop/leiden/huis-vondellaan-26/43889182/',
      '  Source:        funda',
      '  Neighbourhood: Professorenwijk-Oost',
      '  Province:      Zuid-Holland',
      '  Status:        Beschikbaar',
      '  Listed since:  2024-03-15T09:30:00',
      '  Asking price:  € 450.000',
      '  Price per m²:  € 3.750',
      '  Type:          Eengezinswoning (House)',
      '  Living area:   120 m²',
      '  Rooms:         5',
      '  Build year:    1930',
      '  Energy label:  C',
    ]);
  });

  it('prints a dash for missing fields', () => {
    const lines = formatListing({ ...listing, address: null, price: null, status: null }).split('\n');
    expect(lines[0]).toBe('Unknown address');
    expect(lines).toContain('  Neighbourhood: -');
    expect(lines).toContain('  Asking price:  -');
    expect(lines).toContain('  Status:        -');
  });
});
