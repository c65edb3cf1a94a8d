/**
 * Trip Planner: the planning pipeline.
 *
 *   validate ─► budget ─┬─► research ──┐
 *                       └─► discovery ─┴─► synthesis ─► TravelPlan
 *
 * Research and discovery run concurrently and each degrades to an empty
 * result on failure. Synthesis is the only join and the only phase whose
 * failure fails the plan. Each call owns all of its intermediate state.
 */

import {
  tripRequestPayloadSchema,
  type LocationBundle,
  type PlanFailureResponse,
  type PlanningPhase,
  type TravelPlan,
  type TravelPlanResponse,
  type TripContext,
  type TripRequest,
} from "@shared/schema";
import type { AppConfig } from "../config";
import { createOpenAIGenerator } from "./aiClientFactory";
import { resolveBudget } from "./budgetResolver";
import { SynthesisError, TripPlanningError, ValidationError, errorMessage } from "./errors";
import { createDiscoveryClient, type DiscoverFn } from "./googlePlacesService";
import { countLocations, emptyLocationBundle, sealLocationBundle, serializeLocationBundle } from "./locationNormalizer";
import { createResearchClient, type ResearchFn } from "./researchService";
import { createSynthesisEngine, type SynthesizeFn } from "./synthesisService";

const MS_PER_DAY = 24 * 60 * 60 * 1000;
export const MAX_TRIP_DAYS = 60;

// ============================================================================
// TYPES
// ============================================================================

export interface TripPlannerDeps {
  research: ResearchFn;
  discover: DiscoverFn;
  synthesize: SynthesizeFn;
  now?: () => Date;
}

interface PhaseOutcome<T> {
  value: T;
  degraded: boolean;
  ms: number;
}

// ============================================================================
// VALIDATION
// ============================================================================

/** "Mumbai (BOM)" → "Mumbai". Falls back to the code when that is all there is. */
export function cleanPlaceName(raw: string): string {
  const stripped = raw.replace(/\s*\([^)]*\)\s*/g, " ").replace(/\s+/g, " ").trim();
  if (stripped) return stripped;
  return raw.replace(/[()]/g, " ").replace(/\s+/g, " ").trim();
}

function parseIsoDate(value: string): number | null {
  const [y, m, d] = value.split("-").map(Number);
  const ms = Date.UTC(y, m - 1, d);
  const date = new Date(ms);
  if (date.getUTCFullYear() !== y || date.getUTCMonth() !== m - 1 || date.getUTCDate() !== d) {
    return null;
  }
  return ms;
}

/** Whole days between two YYYY-MM-DD dates. */
export function computeDurationDays(departureDate: string, returnDate: string): number {
  const start = parseIsoDate(departureDate);
  const end = parseIsoDate(returnDate);
  if (start === null || end === null) {
    throw new ValidationError("Invalid travel dates", [`${start === null ? departureDate : returnDate} is not a calendar date`]);
  }
  return Math.round((end - start) / MS_PER_DAY);
}

/**
 * Validate a raw payload into a TripRequest. Throws ValidationError
 * (UnknownBudgetTier for an unsupported tier) and never touches the network.
 */
export function parseTripRequest(payload: unknown): TripRequest {
  const parsed = tripRequestPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`);
    throw new ValidationError("Invalid trip request", issues);
  }
  const data = parsed.data;

  const budgetProfile = resolveBudget(data.budget);

  const origin = cleanPlaceName(data.from);
  const destination = cleanPlaceName(data.to);
  if (!origin || !destination) {
    throw new ValidationError("Invalid trip request", ["Origin and destination are required"]);
  }

  const duration = computeDurationDays(data.departureDate, data.returnDate);
  if (duration < 1) {
    throw new ValidationError("Invalid travel dates", ["Return date must be after departure date"]);
  }
  if (duration > MAX_TRIP_DAYS) {
    throw new ValidationError("Invalid travel dates", [`Trips can be at most ${MAX_TRIP_DAYS} days`]);
  }

  return {
    origin,
    destination,
    departureDate: data.departureDate,
    returnDate: data.returnDate,
    passengers: data.passengers,
    budgetTier: budgetProfile.tier,
    travelClass: data.travelClass,
    tripType: data.tripType,
    specificPlaces: data.places ?? [],
  };
}

// ============================================================================
// PHASES
// ============================================================================

async function runDegradablePhase<T>(phase: PlanningPhase, task: () => Promise<T>, fallback: T): Promise<PhaseOutcome<T>> {
  const start = Date.now();
  try {
    const value = await task();
    return { value, degraded: false, ms: Date.now() - start };
  } catch (error) {
    if (error instanceof TripPlanningError) {
      console.warn(`[TripPlanner] ${phase} degraded: ${error.message}`);
    } else {
      console.error(`[TripPlanner] ${phase} degraded on unexpected error:`, error);
    }
    return { value: fallback, degraded: true, ms: Date.now() - start };
  }
}

// ============================================================================
// PUBLIC API
// ============================================================================

export async function planTrip(payload: unknown, deps: TripPlannerDeps): Promise<TravelPlan> {
  const now = deps.now ?? (() => new Date());
  const t0 = Date.now();

  const request = parseTripRequest(payload);
  const budget = resolveBudget(request.budgetTier);
  const trip: TripContext = {
    ...request,
    durationDays: computeDurationDays(request.departureDate, request.returnDate),
  };

  console.log(
    `[TripPlanner] ${trip.origin} → ${trip.destination}, ${trip.durationDays} days, ` +
      `${budget.tier} (${budget.ceiling}), ${trip.passengers} travelers`,
  );

  const [research, discovery] = await Promise.all([
    runDegradablePhase("research", () => deps.research(trip.destination, trip.origin, trip), ""),
    runDegradablePhase<LocationBundle>(
      "discovery",
      () => deps.discover(trip.destination, trip.specificPlaces),
      emptyLocationBundle(),
    ),
  ]);

  const degradedPhases: PlanningPhase[] = [];
  if (research.degraded) degradedPhases.push("research");
  if (discovery.degraded) degradedPhases.push("discovery");

  const locations = sealLocationBundle(discovery.value);

  const synthesisStart = Date.now();
  let itinerary: string;
  try {
    itinerary = await deps.synthesize({
      trip,
      budget,
      researchText: research.value,
      locations,
      degradedPhases,
    });
  } catch (error) {
    console.error(`[TripPlanner] synthesis failed: ${errorMessage(error)}`);
    throw error instanceof SynthesisError ? error : new SynthesisError(errorMessage(error), { cause: error });
  }

  console.log(
    `[TripPlanner] Plan ready in ${Date.now() - t0}ms ` +
      `(research ${research.ms}ms, discovery ${discovery.ms}ms, synthesis ${Date.now() - synthesisStart}ms; ` +
      `${countLocations(locations)} places${degradedPhases.length ? `; degraded: ${degradedPhases.join(", ")}` : ""})`,
  );

  const plan: TravelPlan = {
    success: true,
    origin: trip.origin,
    destination: trip.destination,
    duration: trip.durationDays,
    budget: budget.ceiling,
    travelers: trip.passengers,
    researchText: research.value,
    locations,
    itinerary,
    degradedPhases: Object.freeze([...degradedPhases]),
    generatedAt: now().toISOString(),
  };
  return Object.freeze(plan);
}

export function toTravelPlanResponse(plan: TravelPlan): TravelPlanResponse {
  return {
    success: true,
    destination: plan.destination,
    origin: plan.origin,
    duration: plan.duration,
    budget: plan.budget,
    travelers: plan.travelers,
    comprehensive_plan: plan.itinerary,
    search_results: plan.researchText,
    maps_results: serializeLocationBundle(plan.locations),
    degraded_phases: [...plan.degradedPhases],
    generated_at: plan.generatedAt,
  };
}

export function toFailureResponse(error: unknown, at: Date = new Date()): PlanFailureResponse {
  if (error instanceof ValidationError) {
    return {
      success: false,
      error: error.message,
      error_code: error.code,
      ...(error.issues.length ? { details: error.issues } : {}),
      generated_at: at.toISOString(),
    };
  }
  if (error instanceof TripPlanningError) {
    return { success: false, error: error.message, error_code: error.code, generated_at: at.toISOString() };
  }
  return { success: false, error: "Failed to generate travel plan", error_code: "internal_error", generated_at: at.toISOString() };
}

export function httpStatusFor(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof SynthesisError) return 502;
  return 500;
}

export function createTripPlannerDeps(config: AppConfig): TripPlannerDeps {
  return {
    research: createResearchClient({ apiKey: config.tavilyApiKey, policy: config.research }),
    discover: createDiscoveryClient({
      apiKey: config.googlePlacesApiKey,
      policy: config.places,
      maxResultsPerCategory: config.places.maxResultsPerCategory,
    }),
    synthesize: createSynthesisEngine(
      createOpenAIGenerator({ apiKey: config.openaiApiKey, model: config.synthesisModel, policy: config.synthesis }),
    ),
  };
}
