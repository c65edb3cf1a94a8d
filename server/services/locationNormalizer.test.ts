import { describe, it, expect } from 'vitest';
import {
  normalizeLocations,
  buildLocationBundle,
  emptyLocationBundle,
  countLocations,
  serializeLocationBundle,
} from './locationNormalizer';

// ============================================================================
// TEST DATA
// ============================================================================

const textSearchPlace = (overrides: Record<string, unknown> = {}) => ({
  place_id: 'place-1',
  name: 'Gateway of India',
  formatted_address: 'Apollo Bandar, Colaba, Mumbai',
  geometry: { location: { lat: 18.922, lng: 72.8347 } },
  rating: 4.6,
  user_ratings_total: 1200,
  types: ['tourist_attraction', 'point_of_interest'],
  ...overrides,
});

const placesV1Place = (overrides: Record<string, unknown> = {}) => ({
  id: 'v1-place',
  displayName: { text: 'Marine Drive', languageCode: 'en' },
  formattedAddress: 'Marine Drive, Mumbai',
  location: { latitude: 18.944, longitude: 72.823 },
  rating: 4.7,
  userRatingCount: 900,
  types: ['tourist_attraction'],
  ...overrides,
});

// ============================================================================
// normalizeLocations
// ============================================================================

describe('normalizeLocations', () => {
  it('maps a text search record onto the canonical schema', () => {
    const [record] = normalizeLocations([textSearchPlace()], 'attraction');

    expect(record).toEqual({
      placeId: 'place-1',
      name: 'Gateway of India',
      address: 'Apollo Bandar, Colaba, Mumbai',
      lat: 18.922,
      lng: 72.8347,
      rating: 4.6,
      reviews: 1200,
      category: 'attraction',
      types: ['tourist_attraction', 'point_of_interest'],
    });
  });

  it('maps a Places v1 record onto the canonical schema', () => {
    const [record] = normalizeLocations([placesV1Place()], 'attraction');

    expect(record).toEqual({
      placeId: 'v1-place',
      name: 'Marine Drive',
      address: 'Marine Drive, Mumbai',
      lat: 18.944,
      lng: 72.823,
      rating: 4.7,
      reviews: 900,
      category: 'attraction',
      types: ['tourist_attraction'],
    });
  });

  it('defaults missing rating, reviews, address and types to zero values', () => {
    const [record] = normalizeLocations(
      [{ place_id: 'bare', name: 'Bare Place', geometry: { location: { lat: 19, lng: 72.8 } } }],
      'restaurant',
    );

    expect(record.rating).toBe(0);
    expect(record.reviews).toBe(0);
    expect(record.address).toBe('');
    expect(record.types).toEqual([]);
  });

  it('falls back to vicinity when there is no formatted address', () => {
    const [record] = normalizeLocations(
      [textSearchPlace({ formatted_address: undefined, vicinity: 'Colaba' })],
      'attraction',
    );

    expect(record.address).toBe('Colaba');
  });

  it('clamps ratings into 0-5 and floors review counts', () => {
    const records = normalizeLocations(
      [
        textSearchPlace({ place_id: 'a', rating: 7, user_ratings_total: 10.8 }),
        textSearchPlace({ place_id: 'b', rating: -1, user_ratings_total: -4 }),
        textSearchPlace({ place_id: 'c', rating: '4.5', user_ratings_total: '12' }),
      ],
      'attraction',
    );

    expect(records.map((r) => [r.rating, r.reviews])).toEqual([
      [5, 10],
      [0, 0],
      [0, 0],
    ]);
  });

  it('drops records missing coordinates, id or name', () => {
    const records = normalizeLocations(
      [
        textSearchPlace({ place_id: 'no-geometry', geometry: undefined }),
        textSearchPlace({ place_id: 'no-lng', geometry: { location: { lat: 18.9 } } }),
        textSearchPlace({ place_id: 'bad-lat', geometry: { location: { lat: 120, lng: 72.8 } } }),
        textSearchPlace({ place_id: '' }),
        textSearchPlace({ place_id: 'no-name', name: '   ' }),
        textSearchPlace({ place_id: 'kept' }),
      ],
      'attraction',
    );

    expect(records.map((r) => r.placeId)).toEqual(['kept']);
  });

  it('skips non-object entries without throwing', () => {
    const records = normalizeLocations([null, 42, 'hotel', [], textSearchPlace()], 'hotel');

    expect(records).toHaveLength(1);
  });

  it('returns an empty list for a non-array input', () => {
    expect(normalizeLocations(undefined, 'hotel')).toEqual([]);
    expect(normalizeLocations({ results: [] }, 'hotel')).toEqual([]);
  });

  it('deduplicates by place id within one batch', () => {
    const records = normalizeLocations(
      [
        textSearchPlace({ types: ['museum'] }),
        textSearchPlace({ name: 'Gateway (duplicate)', types: ['landmark'] }),
      ],
      'attraction',
    );

    expect(records).toHaveLength(1);
    expect(records[0].name).toBe('Gateway of India');
    expect(records[0].types).toEqual(['museum', 'landmark']);
  });

  it('is idempotent: the same input yields the same output', () => {
    const raw = [textSearchPlace(), textSearchPlace({ place_id: 'place-2', name: 'Elephanta Caves' }), textSearchPlace()];

    const first = normalizeLocations(raw, 'attraction');
    const second = normalizeLocations(raw, 'attraction');

    expect(second).toEqual(first);
    expect(second).toHaveLength(2);
  });
});

// ============================================================================
// buildLocationBundle
// ============================================================================

describe('buildLocationBundle', () => {
  it('puts each category into its bucket', () => {
    const bundle = buildLocationBundle([
      { category: 'hotel', records: normalizeLocations([textSearchPlace({ place_id: 'h1', name: 'Taj' })], 'hotel') },
      { category: 'restaurant', records: normalizeLocations([textSearchPlace({ place_id: 'r1', name: 'Cafe' })], 'restaurant') },
      { category: 'attraction', records: normalizeLocations([textSearchPlace({ place_id: 'a1' })], 'attraction') },
    ]);

    expect(bundle.hotels.map((r) => r.placeId)).toEqual(['h1']);
    expect(bundle.restaurants.map((r) => r.placeId)).toEqual(['r1']);
    expect(bundle.attractions.map((r) => r.placeId)).toEqual(['a1']);
    expect(bundle.specific_places).toEqual([]);
    expect(countLocations(bundle)).toBe(3);
  });

  it('resolves a place returned as restaurant and attraction to attraction', () => {
    const shared = textSearchPlace({ place_id: 'dup', name: 'Leopold Cafe' });
    const bundle = buildLocationBundle([
      { category: 'restaurant', records: normalizeLocations([shared], 'restaurant') },
      { category: 'attraction', records: normalizeLocations([shared], 'attraction') },
    ]);

    expect(bundle.restaurants).toHaveLength(0);
    expect(bundle.attractions).toHaveLength(1);
    expect(bundle.attractions[0].category).toBe('attraction');
  });

  it('keeps the higher-priority category whichever batch comes first', () => {
    const shared = textSearchPlace({ place_id: 'dup' });
    const bundle = buildLocationBundle([
      { category: 'specific_place', records: normalizeLocations([shared], 'specific_place') },
      { category: 'hotel', records: normalizeLocations([shared], 'hotel') },
    ]);

    expect(bundle.specific_places.map((r) => r.placeId)).toEqual(['dup']);
    expect(bundle.hotels).toHaveLength(0);
  });

  it('applies specific_place > attraction > hotel > restaurant', () => {
    const shared = textSearchPlace({ place_id: 'dup' });
    const batches = (['restaurant', 'hotel', 'attraction', 'specific_place'] as const).map((category) => ({
      category,
      records: normalizeLocations([shared], category),
    }));

    expect(countLocations(buildLocationBundle(batches.slice(0, 2)))).toBe(1);
    expect(buildLocationBundle(batches.slice(0, 2)).hotels).toHaveLength(1);
    expect(buildLocationBundle(batches.slice(0, 3)).attractions).toHaveLength(1);
    expect(buildLocationBundle(batches).specific_places).toHaveLength(1);
  });

  it('keeps first-seen fields and fills a missing rating from the duplicate', () => {
    const bundle = buildLocationBundle([
      {
        category: 'restaurant',
        records: normalizeLocations([textSearchPlace({ place_id: 'dup', rating: undefined, user_ratings_total: 5, types: ['restaurant'] })], 'restaurant'),
      },
      {
        category: 'attraction',
        records: normalizeLocations([textSearchPlace({ place_id: 'dup', name: 'Other Name', rating: 4.2, user_ratings_total: 50, types: ['tourist_attraction'] })], 'attraction'),
      },
    ]);

    const [merged] = bundle.attractions;
    expect(merged.name).toBe('Gateway of India');
    expect(merged.rating).toBe(4.2);
    expect(merged.reviews).toBe(50);
    expect(merged.types).toEqual(['restaurant', 'tourist_attraction']);
  });

  it('returns a frozen bundle', () => {
    const bundle = buildLocationBundle([]);

    expect(Object.isFrozen(bundle)).toBe(true);
    expect(Object.isFrozen(bundle.hotels)).toBe(true);
  });
});

describe('emptyLocationBundle', () => {
  it('has four empty buckets', () => {
    expect(serializeLocationBundle(emptyLocationBundle())).toEqual({
      hotels: [],
      restaurants: [],
      attractions: [],
      specific_places: [],
    });
  });
});

describe('serializeLocationBundle', () => {
  it('emits the map view record shape', () => {
    const bundle = buildLocationBundle([{ category: 'hotel', records: normalizeLocations([textSearchPlace({ place_id: 'h1', name: 'Taj' })], 'hotel') }]);

    expect(serializeLocationBundle(bundle).hotels).toEqual([
      {
        name: 'Taj',
        address: 'Apollo Bandar, Colaba, Mumbai',
        rating: 4.6,
        reviews: 1200,
        lat: 18.922,
        lng: 72.8347,
        types: ['tourist_attraction', 'point_of_interest'],
        place_id: 'h1',
      },
    ]);
  });
});
