/**
 * Google Places Service
 * Location discovery for a destination: hotels, restaurants, attractions and
 * any places the traveller named, one text search per category.
 */

import { z } from "zod";
import type { CallPolicy } from "../config";
import type { LocationBundle, LocationCategory, LocationRecord } from "@shared/schema";
import { fetchJsonWithPolicy } from "../utils/fetchWithPolicy";
import { DiscoveryUnavailable, errorMessage } from "./errors";
import { buildLocationBundle, countLocations, normalizeLocations, type LocationBatch } from "./locationNormalizer";

const TEXT_SEARCH_URL = "https://maps.googleapis.com/maps/api/place/textsearch/json";

/** A named place resolves to its single best match. */
const SPECIFIC_PLACE_MATCHES = 1;

export interface DiscoveryOptions {
  apiKey?: string;
  policy: CallPolicy;
  maxResultsPerCategory: number;
}

export type DiscoverFn = (destination: string, specificPlaces: readonly string[]) => Promise<LocationBundle>;

interface CategoryQuery {
  label: string;
  category: LocationCategory;
  query: string;
  type?: string;
  limit: number;
}

const textSearchResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z.array(z.unknown()).default([]),
});

/**
 * Check if Google Places API is configured
 */
export function isGooglePlacesConfigured(apiKey: string | undefined): boolean {
  return !!apiKey;
}

/**
 * Run one text search and return the raw results in relevance order.
 * ZERO_RESULTS is an empty list, not an error.
 */
export async function searchPlacesRaw(
  query: string,
  options: { apiKey: string; policy: CallPolicy; type?: string },
): Promise<unknown[]> {
  const params = new URLSearchParams({ query, key: options.apiKey });
  if (options.type) {
    params.append("type", options.type);
  }

  const body = await fetchJsonWithPolicy(`${TEXT_SEARCH_URL}?${params}`, { method: "GET" }, options.policy, "GooglePlaces");
  const parsed = textSearchResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error("unexpected text search response shape");
  }

  const data = parsed.data;
  if (data.status === "ZERO_RESULTS") return [];
  if (data.status !== "OK") {
    throw new Error(`API status ${data.status}${data.error_message ? `: ${data.error_message}` : ""}`);
  }
  return data.results;
}

export function buildCategoryQueries(
  destination: string,
  specificPlaces: readonly string[],
  maxResultsPerCategory: number,
): CategoryQuery[] {
  const queries: CategoryQuery[] = [
    { label: "hotels", category: "hotel", query: `hotels in ${destination}`, type: "lodging", limit: maxResultsPerCategory },
    { label: "restaurants", category: "restaurant", query: `restaurants in ${destination}`, type: "restaurant", limit: maxResultsPerCategory },
    { label: "attractions", category: "attraction", query: `tourist attractions in ${destination}`, type: "tourist_attraction", limit: maxResultsPerCategory },
  ];

  const seen = new Set<string>();
  for (const name of specificPlaces) {
    const key = name.trim().toLowerCase();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    queries.push({
      label: `place:${name.trim()}`,
      category: "specific_place",
      query: `${name.trim()}, ${destination}`,
      limit: SPECIFIC_PLACE_MATCHES,
    });
  }
  return queries;
}

/**
 * Discover locations for a destination. Every category query is isolated:
 * a failed or timed-out query leaves its bucket empty and the rest still
 * populate. Only when every query fails does the call itself fail.
 */
export async function discoverLocations(
  destination: string,
  specificPlaces: readonly string[],
  options: DiscoveryOptions,
): Promise<LocationBundle> {
  const { apiKey } = options;
  if (!apiKey) {
    throw new DiscoveryUnavailable("all", "GOOGLE_PLACES_API_KEY is not configured");
  }

  const queries = buildCategoryQueries(destination, specificPlaces, options.maxResultsPerCategory);
  const settled = await Promise.allSettled(
    queries.map(async (q): Promise<LocationBatch> => {
      try {
        const raw = await searchPlacesRaw(q.query, { apiKey, policy: options.policy, type: q.type });
        // Cap before normalizing: the source order is the relevance order.
        const records: LocationRecord[] = normalizeLocations(raw.slice(0, q.limit), q.category);
        return { category: q.category, records };
      } catch (error) {
        throw new DiscoveryUnavailable(q.label, errorMessage(error), { cause: error });
      }
    }),
  );

  const batches: LocationBatch[] = [];
  const failures: string[] = [];
  for (const outcome of settled) {
    if (outcome.status === "fulfilled") {
      batches.push(outcome.value);
    } else {
      failures.push(errorMessage(outcome.reason));
      console.warn(`[GooglePlaces] Category degraded: ${errorMessage(outcome.reason)}`);
    }
  }

  if (batches.length === 0) {
    throw new DiscoveryUnavailable("all", `every category query failed (${failures.length})`);
  }

  const bundle = buildLocationBundle(batches);
  console.log(
    `[GooglePlaces] ${destination}: ${countLocations(bundle)} places ` +
      `(${bundle.hotels.length} hotels, ${bundle.restaurants.length} restaurants, ` +
      `${bundle.attractions.length} attractions, ${bundle.specific_places.length} named)` +
      (failures.length ? `, ${failures.length}/${queries.length} queries failed` : ""),
  );
  return bundle;
}

export function createDiscoveryClient(options: DiscoveryOptions): DiscoverFn {
  return (destination, specificPlaces) => discoverLocations(destination, specificPlaces, options);
}
