/**
 * Synthesis Service
 *
 * Builds the itinerary prompt from everything the earlier phases gathered,
 * makes one model call, and checks the reply has the sections the plan needs
 * (a label for every day, a budget breakdown) before accepting it.
 */

import type { BudgetProfile, LocationBundle, LocationRecord, PlanningPhase, TripContext } from "@shared/schema";
import type { GenerationPrompt, TextGenerator } from "./aiClientFactory";
import { allocateBudget, formatInr } from "./budgetResolver";
import { SynthesisError, errorMessage } from "./errors";

// ============================================================================
// LIMITS
// ============================================================================

const MAX_RESEARCH_CHARS = 6000;
const MAX_LOCATIONS_PER_CATEGORY = 8;
const MAX_LOCATION_LISTING_CHARS = 4000;

// ============================================================================
// TYPES
// ============================================================================

export interface SynthesisInput {
  trip: TripContext;
  budget: BudgetProfile;
  researchText: string;
  locations: LocationBundle;
  degradedPhases: readonly PlanningPhase[];
}

export type SynthesizeFn = (input: SynthesisInput) => Promise<string>;

// ============================================================================
// PROMPT
// ============================================================================

const SYSTEM_PROMPT = `You are an expert travel planner who writes practical, costed itineraries.
Ground every recommendation in the research and location data you are given.
If a section has no supporting data, say so plainly instead of inventing names, prices or addresses.
Label each day on its own heading as "Day N" (for example "Day 1: Arrival"), one heading per day.
Include a section titled "Budget Breakdown" with per-category costs in Indian Rupees.`;

export function excerpt(text: string, max: number): string {
  const trimmed = text.trim();
  if (trimmed.length <= max) return trimmed;
  return `${trimmed.slice(0, max).trimEnd()}\n[Research truncated]`;
}

function describeLocation(record: LocationRecord): string {
  const rating = record.rating > 0 ? `rating ${record.rating.toFixed(1)} (${record.reviews} reviews)` : "unrated";
  return `- ${record.name} | ${record.address || "address unknown"} | ${rating}`;
}

const LISTING_SECTIONS: Array<{ key: keyof LocationBundle; title: string }> = [
  { key: "specific_places", title: "Requested places" },
  { key: "attractions", title: "Attractions" },
  { key: "hotels", title: "Hotels" },
  { key: "restaurants", title: "Restaurants" },
];

/** One line per place: name, address and rating. Coordinates stay out of the prompt. */
export function formatLocationListing(bundle: LocationBundle): string {
  const blocks: string[] = [];
  let used = 0;

  for (const section of LISTING_SECTIONS) {
    const records = bundle[section.key];
    if (records.length === 0) continue;

    const lines = [`${section.title}:`];
    for (const record of records.slice(0, MAX_LOCATIONS_PER_CATEGORY)) {
      const line = describeLocation(record);
      if (used + line.length > MAX_LOCATION_LISTING_CHARS) break;
      lines.push(line);
      used += line.length;
    }
    if (lines.length > 1) blocks.push(lines.join("\n"));
  }

  return blocks.join("\n\n");
}

export function buildSynthesisPrompt(input: SynthesisInput): GenerationPrompt {
  const { trip, budget, researchText, locations, degradedPhases } = input;
  const allocation = allocateBudget(budget, trip.durationDays, trip.passengers);
  const listing = formatLocationListing(locations);
  const research = excerpt(researchText, MAX_RESEARCH_CHARS);

  const tripLines = [
    `- Origin: ${trip.origin}`,
    `- Destination: ${trip.destination}`,
    `- Duration: ${trip.durationDays} days`,
    `- Dates: ${trip.departureDate} to ${trip.returnDate}`,
    `- Travelers: ${trip.passengers}`,
    `- Budget: ${formatInr(budget.ceiling)} total (${budget.label} tier: ${budget.guidance})`,
  ];
  if (trip.travelClass) tripLines.push(`- Travel class: ${trip.travelClass.replace("_", " ")}`);
  if (trip.tripType) tripLines.push(`- Trip type: ${trip.tripType === "oneway" ? "one way" : "round trip"}`);
  if (trip.specificPlaces.length > 0) tripLines.push(`- Must include: ${trip.specificPlaces.join(", ")}`);

  const budgetLines = [
    `- Accommodation: ${formatInr(allocation.totals.accommodation)} (about ${formatInr(allocation.accommodationPerNight)} per night)`,
    `- Food: ${formatInr(allocation.totals.food)} (about ${formatInr(allocation.mealsPerPersonPerDay)} per person per day)`,
    `- Activities: ${formatInr(allocation.totals.activities)}`,
    `- Local transport: ${formatInr(allocation.totals.localTransport)}`,
    `- Contingency: ${formatInr(allocation.totals.contingency)}`,
  ];

  const notes: string[] = [];
  if (degradedPhases.includes("research") || !research) {
    notes.push("Destination research was unavailable; keep general guidance conservative and say it is unverified.");
  }
  if (degradedPhases.includes("discovery") || !listing) {
    notes.push("Location data was unavailable; do not name specific hotels or restaurants you cannot verify.");
  }

  const user = `Create a detailed ${trip.durationDays}-day travel plan for ${trip.destination}.

TRIP DETAILS:
${tripLines.join("\n")}

BUDGET GUIDANCE:
${budgetLines.join("\n")}

SEARCH RESULTS:
${research || "(none)"}

LOCATION DATA:
${listing || "(none)"}
${notes.length ? `\nDATA NOTES:\n${notes.map((n) => `- ${n}`).join("\n")}\n` : ""}
Create a comprehensive plan with:
1. Executive Summary
2. Day-by-day detailed itinerary with timings (Day 1 to Day ${trip.durationDays})
3. Accommodation recommendations (3-4 options)
4. Transportation guide
5. Food & dining suggestions
6. Budget Breakdown
7. Practical tips
8. Backup plans

Ensure the plan stays within ${formatInr(budget.ceiling)} and includes specific costs.`;

  return { system: SYSTEM_PROMPT, user };
}

// ============================================================================
// OUTPUT CHECKS
// ============================================================================

/**
 * A day label that opens a line, optionally after a heading mark, a bullet,
 * a list number or bold markers: "## Day 3", "- **Day 4:**", "Days 5-6: Goa".
 * A range counts only when nothing but punctuation follows it, so
 * "Day 1 to Day 5 plan" labels day 1 alone.
 */
const DAY_HEADING =
  /^[ \t]*(?:#{1,6}[ \t]*|(?:[-+*]|\d{1,3}[.)])[ \t]+)?(?:\*\*|__)?days?[ \t]+(\d{1,3})(?:[ \t]*(?:-|–|—|to)[ \t]*(?:day[ \t]+)?(\d{1,3})(?=[ \t]*(?:[:.)*_]|[-–—][ \t]|$)))?(?!\d)/gim;
const BUDGET_SECTION = /budget\s+breakdown/i;

/** Day numbers the itinerary gives a heading; "## Days 4-5" counts both. */
export function findDayLabels(text: string): Set<number> {
  const days = new Set<number>();
  for (const match of Array.from(text.matchAll(DAY_HEADING))) {
    const start = Number(match[1]);
    const end = match[2] ? Number(match[2]) : start;
    for (let d = start; d <= Math.max(start, end); d++) days.add(d);
  }
  return days;
}

/** Section names missing from the itinerary; empty when it is usable. */
export function findMissingSections(itinerary: string, durationDays: number): string[] {
  const missing: string[] = [];
  const labelled = findDayLabels(itinerary);
  for (let day = 1; day <= durationDays; day++) {
    if (!labelled.has(day)) missing.push(`Day ${day}`);
  }
  if (!BUDGET_SECTION.test(itinerary)) {
    missing.push("Budget Breakdown");
  }
  return missing;
}

// ============================================================================
// PUBLIC API
// ============================================================================

export async function synthesizeItinerary(input: SynthesisInput, generate: TextGenerator): Promise<string> {
  const prompt = buildSynthesisPrompt(input);

  let text: string;
  try {
    text = await generate(prompt);
  } catch (error) {
    throw new SynthesisError(`Model call failed: ${errorMessage(error)}`, { cause: error });
  }

  const itinerary = text.trim();
  if (!itinerary) {
    throw new SynthesisError("Model returned an empty itinerary");
  }

  const missing = findMissingSections(itinerary, input.trip.durationDays);
  if (missing.length > 0) {
    throw new SynthesisError(`Itinerary is missing required sections: ${missing.join(", ")}`);
  }

  console.log(`[Synthesis] Itinerary for ${input.trip.destination}: ${itinerary.length} chars`);
  return itinerary;
}

export function createSynthesisEngine(generate: TextGenerator): SynthesizeFn {
  return (input) => synthesizeItinerary(input, generate);
}
