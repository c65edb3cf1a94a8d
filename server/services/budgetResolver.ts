/**
 * Budget Resolver
 *
 * Maps a budget tier label to a spending ceiling (INR) and per-category
 * guidance. Table-driven; there is no fallback tier.
 */

import { isBudgetTier, type BudgetProfile, type BudgetShares, type BudgetTier } from "@shared/schema";
import { UnknownBudgetTier } from "./errors";

const BUDGET_TABLE: Record<BudgetTier, Omit<BudgetProfile, "tier" | "currency">> = {
  budget: {
    ceiling: 10_000,
    label: "Backpacker",
    guidance: "Hostels or basic guesthouses, street food and local eateries, public transport, free sights",
    shares: { accommodation: 0.35, food: 0.3, activities: 0.15, localTransport: 0.15, contingency: 0.05 },
  },
  mid: {
    ceiling: 25_000,
    label: "Standard",
    guidance: "Comfortable 3-star hotels, casual restaurants, ride-hailing mixed with public transport",
    shares: { accommodation: 0.4, food: 0.25, activities: 0.15, localTransport: 0.1, contingency: 0.1 },
  },
  premium: {
    ceiling: 55_000,
    label: "Upgraded",
    guidance: "4-star hotels, well-reviewed restaurants, private cabs, paid tours and experiences",
    shares: { accommodation: 0.45, food: 0.25, activities: 0.15, localTransport: 0.08, contingency: 0.07 },
  },
  luxury: {
    ceiling: 100_000,
    label: "High-end",
    guidance: "5-star hotels, fine dining, chauffeured transport, private guided experiences",
    shares: { accommodation: 0.5, food: 0.22, activities: 0.15, localTransport: 0.08, contingency: 0.05 },
  },
};

export function resolveBudget(tier: string): BudgetProfile {
  if (!isBudgetTier(tier)) {
    throw new UnknownBudgetTier(tier);
  }
  const entry = BUDGET_TABLE[tier];
  return {
    tier,
    currency: "INR",
    ceiling: entry.ceiling,
    label: entry.label,
    guidance: entry.guidance,
    shares: { ...entry.shares },
  };
}

export interface BudgetAllocation {
  totals: Record<keyof BudgetShares, number>;
  accommodationPerNight: number;
  mealsPerPersonPerDay: number;
}

/**
 * Spread the ceiling over the trip. Nights equal the day count
 * (departure to return), so a 5-day trip books 5 nights.
 */
export function allocateBudget(profile: BudgetProfile, durationDays: number, travelers: number): BudgetAllocation {
  const days = Math.max(1, durationDays);
  const people = Math.max(1, travelers);
  const { shares, ceiling } = profile;

  const totals = {
    accommodation: Math.round(ceiling * shares.accommodation),
    food: Math.round(ceiling * shares.food),
    activities: Math.round(ceiling * shares.activities),
    localTransport: Math.round(ceiling * shares.localTransport),
    contingency: Math.round(ceiling * shares.contingency),
  };

  return {
    totals,
    accommodationPerNight: Math.round(totals.accommodation / days),
    mealsPerPersonPerDay: Math.round(totals.food / (days * people)),
  };
}

export function formatInr(amount: number): string {
  return `₹${amount.toLocaleString("en-IN")}`;
}
