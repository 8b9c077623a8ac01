import { z } from "zod";

export const websites = ["funda", "huislijn"] as const;
export const websiteSchema = z.enum(websites);

export const listingStatuses = ["Beschikbaar", "Onder bod", "Verkocht"] as const;
export const listingStatusSchema = z.enum(listingStatuses);

export const houseTypes = ["Apartment", "House"] as const;
export const houseTypeSchema = z.enum(houseTypes);

export const DEFAULT_COUNTRY = "The Netherlands";

export const addressSchema = z.object({
  street: z.string().min(1),
  number: z.string().regex(/^\d+$/),
  zip_code: z.string().regex(/^\d{4}[A-Z]{2}$/), // 1234AB, never "1234 AB"
  city: z.string().min(1),
  neighbourhood: z.string().nullable().default(null),
  province: z.string().nullable().default(null),
  country: z.string().default(DEFAULT_COUNTRY),
});

export const priceInfoSchema = z.object({
  asking_price: z.number().positive().nullable(),
  asking_price_per_square_meter: z.number().positive().nullable(),
  sale_price: z.number().nullable(),
});

export const propertyInfoSchema = z.object({
  energy_label: z.string().regex(/^[A-G]\+*$/).nullable(),
  living_area: z.number().int().positive().nullable(),
  num_rooms: z.number().int().positive().nullable(),
  build_year: z.number().int().min(1000).max(9999).nullable(),
  property_type: z.string().nullable(),
});

export const listingSchema = z.object({
  address: addressSchema.nullable(),
  property: propertyInfoSchema.nullable(),
  price: priceInfoSchema.nullable(),
  status: listingStatusSchema.nullable(),
  listing_date: z.string().nullable(),
  house_type: houseTypeSchema.nullable(),
  source: websiteSchema,
  url: z.string().url(),
});

// Shape of the URL list file: { "urls": ["https://...", ...] }
export const requestFileSchema = z.object({
  urls: z.array(z.string()),
});

export type Website = z.infer<typeof websiteSchema>;
export type ListingStatus = z.infer<typeof listingStatusSchema>;
export type HouseType = z.infer<typeof houseTypeSchema>;
export type Address = z.infer<typeof addressSchema>;
export type PriceInfo = z.infer<typeof priceInfoSchema>;
export type PropertyInfo = z.infer<typeof propertyInfoSchema>;
export type Listing = z.infer<typeof listingSchema>;
export type RequestFile = z.infer<typeof requestFileSchema>;

export type FeatureTable = Record<string, string>;

/**
 * Result of a single field extractor. A null value always comes with at
 * least one warning saying why the field could not be filled.
 */
export interface ExtractionResult<T> {
  value: T | null;
  warnings: string[];
}
