import { z } from 'zod';
import { classifyCategory } from '../../config/categories.js';
import { PlacesApiError } from '../../utils/errors.js';
import type { Business } from '../../types/business.types.js';

/**
 * Fields requested from the directory. Everything except `fsq_id` and
 * `name` is optional; a missing or mistyped optional field maps to its
 * default (null / false / []) instead of rejecting the record.
 */
export const PLACE_FIELDS = [
  'fsq_id',
  'name',
  'categories',
  'geocodes',
  'location',
  'rating',
  'stats',
  'popularity',
  'price',
  'verified',
  'hours',
  'website',
  'tel',
].join(',');

const optionalString = z.string().min(1).optional().catch(undefined);

const priceSchema = z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]);

const placeSchema = z.object({
  fsq_id: z.string().min(1),
  name: z.string().min(1),
  categories: z.array(z.object({ name: z.string() })).optional().catch(undefined),
  geocodes: z
    .object({ main: z.object({ latitude: z.number(), longitude: z.number() }) })
    .optional()
    .catch(undefined),
  location: z.object({ formatted_address: optionalString }).optional().catch(undefined),
  /** Directory ratings are on a 0–10 scale */
  rating: z.number().min(0).max(10).optional().catch(undefined),
  stats: z.object({ total_ratings: z.number().int().nonnegative().optional().catch(undefined) }).optional().catch(undefined),
  popularity: z.number().min(0).max(1).optional().catch(undefined),
  price: priceSchema.optional().catch(undefined),
  verified: z.boolean().optional().catch(undefined),
  hours: z.object({ display: optionalString }).optional().catch(undefined),
  website: optionalString,
  tel: optionalString,
});

const envelopeSchema = z.object({
  results: z.array(z.unknown()),
});

export type PlaceRecord = z.infer<typeof placeSchema>;

export interface MalformedRecord {
  /** The record's id when it had a usable one */
  externalId: string | null;
  reason: string;
}

export interface ParsedPlaces {
  businesses: Business[];
  malformed: MalformedRecord[];
}

/** Directory 0–10 rating to the 0–5, one-decimal scale. */
export function toFiveStarRating(rating: number): number {
  return Math.round((rating / 2) * 10) / 10;
}

export function mapPlaceToBusiness(place: PlaceRecord, seenAt: Date): Business {
  const categoryLabels = (place.categories ?? []).map((category) => category.name);
  const coordinates = place.geocodes?.main;

  return {
    id: place.fsq_id,
    name: place.name,
    category: classifyCategory(categoryLabels),
    categoryLabels,
    location: coordinates ? { lat: coordinates.latitude, lng: coordinates.longitude } : null,
    address: place.location?.formatted_address ?? null,
    rating: place.rating === undefined ? null : toFiveStarRating(place.rating),
    reviewCount: place.stats?.total_ratings ?? null,
    popularity: place.popularity ?? null,
    priceTier: place.price ?? null,
    verified: place.verified ?? false,
    hours: place.hours?.display ?? null,
    website: place.website ?? null,
    phone: place.tel ?? null,
    isCompetitor: false,
    firstSeenAt: seenAt,
    lastSeenAt: seenAt,
    missedScans: 0,
  };
}

function externalIdOf(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null || !('fsq_id' in raw)) return null;
  const id = raw.fsq_id;
  return typeof id === 'string' && id.length > 0 ? id : null;
}

/**
 * Parse a places search response body. An unusable envelope throws a
 * `malformed` PlacesApiError; individual bad records are skipped and reported.
 */
export function parsePlacesResponse(body: unknown, seenAt: Date): ParsedPlaces {
  const envelope = envelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new PlacesApiError('Places response did not contain a results array', 'malformed');
  }

  const businesses: Business[] = [];
  const malformed: MalformedRecord[] = [];
  const seen = new Set<string>();

  for (const raw of envelope.data.results) {
    const result = placeSchema.safeParse(raw);
    if (!result.success) {
      const reason = result.error.errors
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join(', ');
      malformed.push({ externalId: externalIdOf(raw), reason });
      continue;
    }

    if (seen.has(result.data.fsq_id)) continue;
    seen.add(result.data.fsq_id);
    businesses.push(mapPlaceToBusiness(result.data, seenAt));
  }

  return { businesses, malformed };
}
