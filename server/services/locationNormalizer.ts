/**
 * Location Normalizer
 *
 * Turns raw Google Places records into canonical LocationRecords.
 * One mapping per provider shape; a record that matches no shape, or lacks
 * an id, a name or either coordinate, is dropped. Never throws.
 */

import { z } from "zod";
import {
  BUNDLE_KEY_BY_CATEGORY,
  CATEGORY_PRIORITY,
  LOCATION_CATEGORIES,
  type LocationBundle,
  type LocationCategory,
  type LocationRecord,
  type SerializedLocation,
  type SerializedLocationBundle,
} from "@shared/schema";

// ============================================================================
// PROVIDER SHAPES
// ============================================================================

const finite = z.number().finite();
const nonBlank = z.string().trim().min(1);

/** Places API "Text Search" (maps/api/place/textsearch/json) result. */
const textSearchPlaceSchema = z.object({
  place_id: nonBlank,
  name: nonBlank,
  formatted_address: z.string().optional(),
  vicinity: z.string().optional(),
  geometry: z.object({
    location: z.object({ lat: finite, lng: finite }),
  }),
  rating: z.unknown().optional(),
  user_ratings_total: z.unknown().optional(),
  types: z.unknown().optional(),
});

/** Places API v1 (places.googleapis.com/v1) place. */
const placesV1Schema = z.object({
  id: nonBlank,
  displayName: z.object({ text: nonBlank }),
  formattedAddress: z.string().optional(),
  location: z.object({ latitude: finite, longitude: finite }),
  rating: z.unknown().optional(),
  userRatingCount: z.unknown().optional(),
  types: z.unknown().optional(),
});

type ProviderMapper = (raw: unknown, category: LocationCategory) => LocationRecord | null;

function toRating(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return 0;
  return Math.min(5, Math.max(0, value));
}

function toReviewCount(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) return 0;
  return Math.floor(value);
}

function toTypes(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((t): t is string => typeof t === "string" && t.length > 0);
}

function isValidCoordinate(lat: number, lng: number): boolean {
  return lat >= -90 && lat <= 90 && lng >= -180 && lng <= 180;
}

const fromTextSearch: ProviderMapper = (raw, category) => {
  const parsed = textSearchPlaceSchema.safeParse(raw);
  if (!parsed.success) return null;
  const p = parsed.data;
  const { lat, lng } = p.geometry.location;
  if (!isValidCoordinate(lat, lng)) return null;

  return {
    placeId: p.place_id,
    name: p.name.trim(),
    address: (p.formatted_address ?? p.vicinity ?? "").trim(),
    lat,
    lng,
    rating: toRating(p.rating),
    reviews: toReviewCount(p.user_ratings_total),
    category,
    types: toTypes(p.types),
  };
};

const fromPlacesV1: ProviderMapper = (raw, category) => {
  const parsed = placesV1Schema.safeParse(raw);
  if (!parsed.success) return null;
  const p = parsed.data;
  const { latitude: lat, longitude: lng } = p.location;
  if (!isValidCoordinate(lat, lng)) return null;

  return {
    placeId: p.id,
    name: p.displayName.text.trim(),
    address: (p.formattedAddress ?? "").trim(),
    lat,
    lng,
    rating: toRating(p.rating),
    reviews: toReviewCount(p.userRatingCount),
    category,
    types: toTypes(p.types),
  };
};

const PROVIDER_MAPPERS: ProviderMapper[] = [fromTextSearch, fromPlacesV1];

function mapRecord(raw: unknown, category: LocationCategory): LocationRecord | null {
  for (const mapper of PROVIDER_MAPPERS) {
    const record = mapper(raw, category);
    if (record) return record;
  }
  return null;
}

// ============================================================================
// DEDUPLICATION
// ============================================================================

/**
 * Fold `incoming` into `existing` (same place id). The first-seen fields are
 * kept; the category moves up only if the incoming one has higher priority.
 */
function mergeRecords(existing: LocationRecord, incoming: LocationRecord): LocationRecord {
  const category =
    CATEGORY_PRIORITY[incoming.category] > CATEGORY_PRIORITY[existing.category] ? incoming.category : existing.category;

  return {
    ...existing,
    address: existing.address || incoming.address,
    rating: existing.rating || incoming.rating,
    reviews: Math.max(existing.reviews, incoming.reviews),
    category,
    types: Array.from(new Set([...existing.types, ...incoming.types])),
  };
}

function dedupeInto(target: Map<string, LocationRecord>, records: Iterable<LocationRecord>): void {
  for (const record of records) {
    const existing = target.get(record.placeId);
    target.set(record.placeId, existing ? mergeRecords(existing, record) : record);
  }
}

// ============================================================================
// PUBLIC API
// ============================================================================

export function normalizeLocations(rawRecords: unknown, category: LocationCategory): LocationRecord[] {
  if (!Array.isArray(rawRecords)) return [];

  const mapped: LocationRecord[] = [];
  for (const raw of rawRecords) {
    const record = mapRecord(raw, category);
    if (record) mapped.push(record);
  }

  const byId = new Map<string, LocationRecord>();
  dedupeInto(byId, mapped);
  return Array.from(byId.values());
}

export interface LocationBatch {
  category: LocationCategory;
  records: readonly LocationRecord[];
}

export function emptyLocationBundle(): LocationBundle {
  return Object.freeze({
    hotels: Object.freeze([]),
    restaurants: Object.freeze([]),
    attractions: Object.freeze([]),
    specific_places: Object.freeze([]),
  });
}

/**
 * Merge per-category results into one bundle, deduplicating across
 * categories. Each place lands in the bucket of its winning category.
 * The returned bundle is frozen.
 */
export function buildLocationBundle(batches: readonly LocationBatch[]): LocationBundle {
  const byId = new Map<string, LocationRecord>();
  for (const batch of batches) {
    dedupeInto(
      byId,
      batch.records.map((r) => (r.category === batch.category ? r : { ...r, category: batch.category })),
    );
  }

  const buckets: Record<keyof LocationBundle, LocationRecord[]> = {
    hotels: [],
    restaurants: [],
    attractions: [],
    specific_places: [],
  };
  for (const record of Array.from(byId.values())) {
    buckets[BUNDLE_KEY_BY_CATEGORY[record.category]].push(Object.freeze(record));
  }

  return Object.freeze({
    hotels: Object.freeze(buckets.hotels),
    restaurants: Object.freeze(buckets.restaurants),
    attractions: Object.freeze(buckets.attractions),
    specific_places: Object.freeze(buckets.specific_places),
  });
}

/**
 * Bundles from buildLocationBundle pass through untouched. Anything else is
 * rebuilt so the bundle, its buckets and its records are all frozen.
 */
export function sealLocationBundle(bundle: LocationBundle): LocationBundle {
  const sealed =
    Object.isFrozen(bundle) &&
    LOCATION_CATEGORIES.every((category) => {
      const bucket = bundle[BUNDLE_KEY_BY_CATEGORY[category]];
      return Object.isFrozen(bucket) && bucket.every((record) => Object.isFrozen(record));
    });
  if (sealed) return bundle;

  return buildLocationBundle(
    LOCATION_CATEGORIES.map((category) => ({ category, records: bundle[BUNDLE_KEY_BY_CATEGORY[category]] })),
  );
}

export function countLocations(bundle: LocationBundle): number {
  return bundle.hotels.length + bundle.restaurants.length + bundle.attractions.length + bundle.specific_places.length;
}

function serializeLocation(record: LocationRecord): SerializedLocation {
  return {
    name: record.name,
    address: record.address,
    rating: record.rating,
    reviews: record.reviews,
    lat: record.lat,
    lng: record.lng,
    types: [...record.types],
    place_id: record.placeId,
  };
}

export function serializeLocationBundle(bundle: LocationBundle): SerializedLocationBundle {
  return {
    hotels: bundle.hotels.map(serializeLocation),
    restaurants: bundle.restaurants.map(serializeLocation),
    attractions: bundle.attractions.map(serializeLocation),
    specific_places: bundle.specific_places.map(serializeLocation),
  };
}
