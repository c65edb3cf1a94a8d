import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { TripContext } from '@shared/schema';
import {
  buildSynthesisPrompt,
  findDayLabels,
  findMissingSections,
  formatLocationListing,
  synthesizeItinerary,
  excerpt,
  type SynthesisInput,
} from './synthesisService';
import { resolveBudget } from './budgetResolver';
import { buildLocationBundle, emptyLocationBundle, normalizeLocations } from './locationNormalizer';
import { SynthesisError } from './errors';

// ============================================================================
// TEST DATA
// ============================================================================

const trip: TripContext = {
  origin: 'Delhi',
  destination: 'Mumbai',
  departureDate: '2025-12-20',
  returnDate: '2025-12-25',
  passengers: 2,
  budgetTier: 'mid',
  travelClass: 'premium_economy',
  tripType: 'roundtrip',
  specificPlaces: ['Gateway of India'],
  durationDays: 5,
};

const bundle = buildLocationBundle([
  {
    category: 'hotel',
    records: normalizeLocations(
      [
        {
          place_id: 'h1',
          name: 'Taj Mahal Palace',
          formatted_address: 'Apollo Bandar, Colaba',
          geometry: { location: { lat: 18.9217, lng: 72.8332 } },
          rating: 4.7,
          user_ratings_total: 51234,
        },
      ],
      'hotel',
    ),
  },
  {
    category: 'restaurant',
    records: normalizeLocations(
      [{ place_id: 'r1', name: 'Street Stall', geometry: { location: { lat: 19.01, lng: 72.84 } } }],
      'restaurant',
    ),
  },
]);

const input = (overrides: Partial<SynthesisInput> = {}): SynthesisInput => ({
  trip,
  budget: resolveBudget('mid'),
  researchText: '## General Information\nSearch Answer: Mumbai is coastal.',
  locations: bundle,
  degradedPhases: [],
  ...overrides,
});

const validItinerary = [
  '# Executive Summary',
  'A five day trip.',
  '## Day 1: Arrival',
  '## Day 2: South Mumbai',
  '## Day 3: Elephanta Caves',
  '## Day 4: Bandra',
  '## Day 5: Departure',
  '## Budget Breakdown',
  '- Accommodation: ₹10,000',
].join('\n');

// ============================================================================
// PROMPT
// ============================================================================

describe('buildSynthesisPrompt', () => {
  it('embeds trip parameters, duration and budget guidance', () => {
    const { user } = buildSynthesisPrompt(input());

    expect(user.startsWith('Create a detailed 5-day travel plan for Mumbai.')).toBe(true);
    expect(user).toContain('- Origin: Delhi');
    expect(user).toContain('- Duration: 5 days');
    expect(user).toContain('- Dates: 2025-12-20 to 2025-12-25');
    expect(user).toContain('- Travelers: 2');
    expect(user).toContain('- Travel class: premium economy');
    expect(user).toContain('- Trip type: round trip');
    expect(user).toContain('- Must include: Gateway of India');
    expect(user).toContain('- Accommodation: ₹10,000 (about ₹2,000 per night)');
    expect(user).toContain('- Food: ₹6,250 (about ₹625 per person per day)');
    expect(user).toContain('Ensure the plan stays within ₹25,000 and includes specific costs.');
  });

  it('lists locations by name, address and rating without coordinates', () => {
    const { user } = buildSynthesisPrompt(input());

    expect(user).toContain('- Taj Mahal Palace | Apollo Bandar, Colaba | rating 4.7 (51234 reviews)');
    expect(user).toContain('- Street Stall | address unknown | unrated');
    expect(user).not.toContain('18.9217');
    expect(user).not.toContain('72.8332');
  });

  it('includes the research text', () => {
    const { user } = buildSynthesisPrompt(input());

    expect(user).toContain('SEARCH RESULTS:\n## General Information\nSearch Answer: Mumbai is coastal.');
  });

  it('asks the model to flag thin grounding when phases degraded', () => {
    const { user } = buildSynthesisPrompt(
      input({ researchText: '', locations: emptyLocationBundle(), degradedPhases: ['research', 'discovery'] }),
    );

    expect(user).toContain('SEARCH RESULTS:\n(none)');
    expect(user).toContain('LOCATION DATA:\n(none)');
    expect(user).toContain('- Destination research was unavailable; keep general guidance conservative and say it is unverified.');
    expect(user).toContain('- Location data was unavailable; do not name specific hotels or restaurants you cannot verify.');
  });

  it('adds no data notes when every phase succeeded', () => {
    expect(buildSynthesisPrompt(input()).user).not.toContain('DATA NOTES');
  });

  it('requires day labels and a budget breakdown in the system prompt', () => {
    const { system } = buildSynthesisPrompt(input());

    expect(system).toContain('"Day N"');
    expect(system).toContain('"Budget Breakdown"');
  });
});

describe('excerpt', () => {
  it('leaves short text alone', () => {
    expect(excerpt('  short  ', 100)).toBe('short');
  });

  it('truncates long text and marks it', () => {
    expect(excerpt('abcdefghij', 4)).toBe('abcd\n[Research truncated]');
  });
});

describe('formatLocationListing', () => {
  it('caps each category at eight entries', () => {
    const raw = Array.from({ length: 12 }, (_, i) => ({
      place_id: `a${i}`,
      name: `Attraction ${i}`,
      geometry: { location: { lat: 19, lng: 72.8 } },
    }));
    const listing = formatLocationListing(
      buildLocationBundle([{ category: 'attraction', records: normalizeLocations(raw, 'attraction') }]),
    );

    expect(listing.split('\n')).toHaveLength(9);
    expect(listing).toContain('Attraction 7');
    expect(listing).not.toContain('Attraction 8');
  });

  it('returns an empty string for an empty bundle', () => {
    expect(formatLocationListing(emptyLocationBundle())).toBe('');
  });
});

// ============================================================================
// OUTPUT CHECKS
// ============================================================================

describe('findDayLabels', () => {
  it('collects single day labels', () => {
    expect(Array.from(findDayLabels('Day 1: x\nDAY 2 - y\n**Day 3**'))).toEqual([1, 2, 3]);
  });

  it('expands ranges', () => {
    expect(Array.from(findDayLabels('Day 1\nDays 2-4: beaches\nDay 5 to 6'))).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('ignores "5-day" style adjectives', () => {
    expect(findDayLabels('A 5-day plan for a day trip').size).toBe(0);
  });

  it('reads headings behind markdown marks and list numbers', () => {
    const text = ['### Day 1: Arrive', '- **Day 2:** Colaba', '3. Day 3 - Elephanta', '__Day 4__', '## Days 5 – 6 – Goa'].join('\n');

    expect(Array.from(findDayLabels(text))).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('ignores day mentions inside a sentence', () => {
    expect(findDayLabels('Here is your Day 1 to Day 5 plan.\nRest on Days 1 and 5.').size).toBe(0);
  });

  it('treats a line-leading "Day 1 to Day 5 plan" as day 1 only', () => {
    expect(Array.from(findDayLabels('Day 1 to Day 5 plan for Mumbai'))).toEqual([1]);
  });

  it('does not expand "and" or "&" into a range', () => {
    expect(Array.from(findDayLabels('Days 1 and 5: rest\nDay 2 & 4: walks'))).toEqual([1, 2]);
  });

  it('reads three-digit day numbers', () => {
    expect(Array.from(findDayLabels('## Day 99\n## Day 100\n## Days 101-102:'))).toEqual([99, 100, 101, 102]);
  });
});

describe('findMissingSections', () => {
  it('accepts a complete itinerary', () => {
    expect(findMissingSections(validItinerary, 5)).toEqual([]);
  });

  it('names missing days and the missing budget breakdown', () => {
    expect(findMissingSections('Day 1\nDay 3', 4)).toEqual(['Day 2', 'Day 4', 'Budget Breakdown']);
  });

  it('rejects a one-line reply that only names the day range', () => {
    expect(findMissingSections('Here is your Day 1 to Day 5 plan. Enjoy Mumbai!\nBudget Breakdown: TBD', 5)).toEqual([
      'Day 1',
      'Day 2',
      'Day 3',
      'Day 4',
      'Day 5',
    ]);
  });

  it('does not count days joined by "and" as present', () => {
    expect(findMissingSections('Day 1 arrive. On Days 1 and 5 rest.\nBudget Breakdown', 5)).toEqual([
      'Day 2',
      'Day 3',
      'Day 4',
      'Day 5',
    ]);
  });

  it('accepts a complete itinerary longer than 99 days', () => {
    const long = [...Array.from({ length: 120 }, (_, i) => `## Day ${i + 1}: Explore`), '## Budget Breakdown'].join('\n');

    expect(findMissingSections(long, 120)).toEqual([]);
  });
});

// ============================================================================
// synthesizeItinerary
// ============================================================================

describe('synthesizeItinerary', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('calls the model once and returns the trimmed itinerary', async () => {
    const generate = vi.fn(async () => `\n${validItinerary}\n\n`);

    await expect(synthesizeItinerary(input(), generate)).resolves.toBe(validItinerary);
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it('wraps a transport failure in SynthesisError', async () => {
    const generate = vi.fn(async (): Promise<string> => {
      throw new Error('ECONNRESET');
    });

    await expect(synthesizeItinerary(input(), generate)).rejects.toThrow('Model call failed: ECONNRESET');
    await expect(synthesizeItinerary(input(), generate)).rejects.toBeInstanceOf(SynthesisError);
  });

  it('rejects an empty response', async () => {
    await expect(synthesizeItinerary(input(), async () => '   ')).rejects.toThrow('Model returned an empty itinerary');
  });

  it('rejects a response without the day-by-day breakdown', async () => {
    const partial = '# Summary\nDay 1: arrive\n## Budget Breakdown\n- Hotel';

    await expect(synthesizeItinerary(input(), async () => partial)).rejects.toThrow(
      'Itinerary is missing required sections: Day 2, Day 3, Day 4, Day 5',
    );
  });

  it('rejects a response without a budget breakdown', async () => {
    const noBudget = validItinerary.replace('## Budget Breakdown', '## Costs');

    await expect(synthesizeItinerary(input(), async () => noBudget)).rejects.toThrow(
      'Itinerary is missing required sections: Budget Breakdown',
    );
  });
});
