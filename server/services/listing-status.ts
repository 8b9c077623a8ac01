import { listingStatuses, type ListingStatus } from '@shared/schema';
import { EmptyInputError, UnrecognizedStatusError } from '../errors';

// Lower-case aliases per status, as shown on listing pages (Dutch and English)
const LISTING_STATUS_ALIASES: Record<ListingStatus, string[]> = {
  'Beschikbaar': ['beschikbaar', 'available'],
  'Onder bod': ['onder bod', 'under offer'],
  'Verkocht': ['verkocht', 'sold', 'verkocht onder voorbehoud'],
};

export const ListingStatuses = {
  AVAILABLE: 'Beschikbaar',
  UNDER_OFFER: 'Onder bod',
  SOLD: 'Verkocht',
} as const satisfies Record<string, ListingStatus>;

/**
 * Resolves free text such as " Verkocht onder voorbehoud " to a status.
 * Matching ignores case, surrounding whitespace and repeated inner spaces.
 */
export function parseListingStatus(text: string): ListingStatus {
  const normalized = text.toLowerCase().trim().replace(/\s+/g, ' ');
  if (!normalized) {
    throw new EmptyInputError('Cannot determine listing status from empty string');
  }

  for (const status of listingStatuses) {
    if (normalized === status.toLowerCase() || LISTING_STATUS_ALIASES[status].includes(normalized)) {
      return status;
    }
  }

  throw new UnrecognizedStatusError(normalized);
}
