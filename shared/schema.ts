import { z } from "zod";

// ============================================================================
// TRIP REQUEST
// ============================================================================

export const BUDGET_TIERS = ["budget", "mid", "premium", "luxury"] as const;
export type BudgetTier = (typeof BUDGET_TIERS)[number];

export function isBudgetTier(value: string): value is BudgetTier {
  return BUDGET_TIERS.some((tier) => tier === value);
}

const isoDate = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be YYYY-MM-DD format");

/**
 * Raw request payload as the request layer receives it.
 * `passengers` arrives as a string from form posts, so digit strings are
 * coerced; booleans and other non-numeric values are rejected.
 * The budget tier is checked separately so an unsupported label surfaces
 * as UnknownBudgetTier rather than a generic schema failure.
 */
export const tripRequestPayloadSchema = z.object({
  from: z.string().trim().min(1, "Origin is required"),
  to: z.string().trim().min(1, "Destination is required"),
  departureDate: isoDate,
  returnDate: isoDate,
  passengers: z
    .union([z.number(), z.string().trim().regex(/^\d+$/, "Passengers must be a whole number")], {
      errorMap: () => ({ message: "Passengers must be a whole number" }),
    })
    .pipe(z.coerce.number().int("Passengers must be a whole number").min(1, "At least one passenger is required")),
  budget: z.string().trim().min(1, "Budget tier is required"),
  travelClass: z.enum(["economy", "premium_economy", "business", "first"]).optional(),
  tripType: z.enum(["roundtrip", "oneway"]).optional(),
  places: z.array(z.string().trim().min(1)).max(10).optional(),
});

export type TripRequestPayload = z.input<typeof tripRequestPayloadSchema>;

export interface TripRequest {
  origin: string;
  destination: string;
  departureDate: string; // YYYY-MM-DD
  returnDate: string; // YYYY-MM-DD
  passengers: number;
  budgetTier: BudgetTier;
  travelClass?: "economy" | "premium_economy" | "business" | "first";
  tripType?: "roundtrip" | "oneway";
  specificPlaces: string[];
}

/** Everything the research and synthesis steps need about the trip. */
export interface TripContext extends TripRequest {
  durationDays: number;
}

// ============================================================================
// LOCATIONS
// ============================================================================

export const LOCATION_CATEGORIES = ["hotel", "restaurant", "attraction", "specific_place"] as const;
export type LocationCategory = (typeof LOCATION_CATEGORIES)[number];

/** Higher wins when the same place comes back under two categories. */
export const CATEGORY_PRIORITY: Record<LocationCategory, number> = {
  specific_place: 4,
  attraction: 3,
  hotel: 2,
  restaurant: 1,
};

export interface LocationRecord {
  placeId: string;
  name: string;
  address: string;
  lat: number;
  lng: number;
  rating: number; // 0-5, 0 when unknown
  reviews: number;
  category: LocationCategory;
  types: string[];
}

export interface LocationBundle {
  readonly hotels: readonly LocationRecord[];
  readonly restaurants: readonly LocationRecord[];
  readonly attractions: readonly LocationRecord[];
  readonly specific_places: readonly LocationRecord[];
}

export type BundleKey = keyof LocationBundle;

export const BUNDLE_KEY_BY_CATEGORY: Record<LocationCategory, BundleKey> = {
  hotel: "hotels",
  restaurant: "restaurants",
  attraction: "attractions",
  specific_place: "specific_places",
};

// ============================================================================
// BUDGET
// ============================================================================

export interface BudgetShares {
  accommodation: number;
  food: number;
  activities: number;
  localTransport: number;
  contingency: number;
}

export interface BudgetProfile {
  tier: BudgetTier;
  ceiling: number;
  currency: "INR";
  label: string;
  guidance: string;
  shares: BudgetShares;
}

// ============================================================================
// TRAVEL PLAN
// ============================================================================

export type PlanningPhase = "research" | "discovery" | "synthesis";

export interface TravelPlan {
  readonly success: true;
  readonly origin: string;
  readonly destination: string;
  readonly duration: number;
  readonly budget: number;
  readonly travelers: number;
  readonly researchText: string;
  readonly locations: LocationBundle;
  readonly itinerary: string;
  readonly degradedPhases: readonly PlanningPhase[];
  readonly generatedAt: string;
}

/** Record shape consumed by the map view. */
export interface SerializedLocation {
  name: string;
  address: string;
  rating: number;
  reviews: number;
  lat: number;
  lng: number;
  types: string[];
  place_id: string;
}

export interface SerializedLocationBundle {
  hotels: SerializedLocation[];
  restaurants: SerializedLocation[];
  attractions: SerializedLocation[];
  specific_places: SerializedLocation[];
}

export interface TravelPlanResponse {
  success: true;
  destination: string;
  origin: string;
  duration: number;
  budget: number;
  travelers: number;
  comprehensive_plan: string;
  search_results: string;
  maps_results: SerializedLocationBundle;
  degraded_phases: PlanningPhase[];
  generated_at: string;
}

export interface PlanFailureResponse {
  success: false;
  error: string;
  error_code: string;
  details?: string[];
  generated_at: string;
}
