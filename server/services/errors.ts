/**
 * Trip planning error taxonomy.
 *
 * Fatal to a plan call: ValidationError (incl. UnknownBudgetTier), SynthesisError.
 * Absorbed by the planner: ResearchUnavailable, DiscoveryUnavailable.
 */

export type TripPlanningErrorCode =
  | "validation_error"
  | "unknown_budget_tier"
  | "research_unavailable"
  | "discovery_unavailable"
  | "synthesis_error";

export abstract class TripPlanningError extends Error {
  abstract readonly code: TripPlanningErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends TripPlanningError {
  readonly code: TripPlanningErrorCode = "validation_error";
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.issues = issues;
  }
}

export class UnknownBudgetTier extends ValidationError {
  override readonly code: TripPlanningErrorCode = "unknown_budget_tier";
  readonly tier: string;

  constructor(tier: string) {
    super(`Unsupported budget tier "${tier}". Expected one of: budget, mid, premium, luxury`);
    this.tier = tier;
  }
}

export class ResearchUnavailable extends TripPlanningError {
  readonly code: TripPlanningErrorCode = "research_unavailable";
}

export class DiscoveryUnavailable extends TripPlanningError {
  readonly code: TripPlanningErrorCode = "discovery_unavailable";
  readonly category: string;

  constructor(category: string, message: string, options?: { cause?: unknown }) {
    super(`[${category}] ${message}`, options);
    this.category = category;
  }
}

export class SynthesisError extends TripPlanningError {
  readonly code: TripPlanningErrorCode = "synthesis_error";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
