/**
 * Research Service
 *
 * Destination research through the Tavily search/answer API. One query per
 * topic, run concurrently; the answers and top results are stitched into a
 * single labelled text block for the itinerary prompt.
 */

import { z } from "zod";
import type { CallPolicy } from "../config";
import type { TripContext } from "@shared/schema";
import { fetchJsonWithPolicy } from "../utils/fetchWithPolicy";
import { ResearchUnavailable, errorMessage } from "./errors";

// ============================================================================
// CONSTANTS
// ============================================================================

const TAVILY_SEARCH_URL = "https://api.tavily.com/search";
const MAX_RESULTS_PER_QUERY = 10;
const RESULTS_SHOWN_PER_TOPIC = 5;
const MAX_SNIPPET_LENGTH = 500;

// ============================================================================
// TYPES
// ============================================================================

export interface ResearchTopic {
  id: "general" | "attractions" | "budget" | "transport" | "safety";
  title: string;
  query: (ctx: TripContext) => string;
}

export interface ResearchOptions {
  apiKey?: string;
  policy: CallPolicy;
}

export type ResearchFn = (destination: string, origin: string, ctx: TripContext) => Promise<string>;

const tavilyResponseSchema = z.object({
  answer: z.string().nullish(),
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        content: z.string().nullish(),
      }),
    )
    .default([]),
});

type TavilyResponse = z.infer<typeof tavilyResponseSchema>;

export const RESEARCH_TOPICS: ResearchTopic[] = [
  {
    id: "general",
    title: "General Information",
    query: (ctx) => `${ctx.destination} travel guide: overview, weather and best time to visit`,
  },
  {
    id: "attractions",
    title: "Attractions & Activities",
    query: (ctx) => `Top attractions and activities in ${ctx.destination} with entry prices`,
  },
  {
    id: "budget",
    title: "Budget Estimates",
    query: (ctx) =>
      `${ctx.destination} daily travel budget in Indian Rupees for ${ctx.passengers} travelers: hotel, food and dining costs`,
  },
  {
    id: "transport",
    title: "Getting There & Around",
    query: (ctx) => `How to travel from ${ctx.origin} to ${ctx.destination} and local transportation options and costs`,
  },
  {
    id: "safety",
    title: "Safety & Local Customs",
    query: (ctx) => `${ctx.destination} safety tips and local customs for tourists`,
  },
];

// ============================================================================
// TAVILY
// ============================================================================

async function searchTavily(query: string, options: ResearchOptions & { apiKey: string }): Promise<TavilyResponse> {
  const body = await fetchJsonWithPolicy(
    TAVILY_SEARCH_URL,
    {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        api_key: options.apiKey,
        query,
        search_depth: "advanced",
        include_answer: true,
        max_results: MAX_RESULTS_PER_QUERY,
      }),
    },
    options.policy,
    "Research",
  );

  const parsed = tavilyResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error(`unexpected response shape: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  return parsed.data;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max).trimEnd()}...` : text;
}

/** Returns null when the response carries nothing usable. */
export function formatTopicSection(title: string, response: TavilyResponse): string | null {
  const answer = response.answer?.trim() ?? "";
  const results = response.results
    .filter((r) => (r.title ?? "").trim() || (r.content ?? "").trim())
    .slice(0, RESULTS_SHOWN_PER_TOPIC);

  if (!answer && results.length === 0) return null;

  const lines = [`## ${title}`];
  if (answer) {
    lines.push(`Search Answer: ${answer}`);
  }
  if (results.length > 0) {
    lines.push("", "Top Results:");
    results.forEach((r, i) => {
      lines.push(`${i + 1}. ${(r.title ?? "").trim() || "N/A"}`);
      lines.push(`   ${truncate((r.content ?? "").trim() || "N/A", MAX_SNIPPET_LENGTH)}`);
      lines.push(`   Source: ${(r.url ?? "").trim() || "N/A"}`);
    });
  }
  return lines.join("\n");
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Research a destination. Topics that fail are logged and left out; the call
 * fails only when no topic produced anything.
 */
export async function researchDestination(
  destination: string,
  origin: string,
  ctx: TripContext,
  options: ResearchOptions,
): Promise<string> {
  const { apiKey } = options;
  if (!apiKey) {
    throw new ResearchUnavailable("TAVILY_API_KEY is not configured");
  }

  const topicCtx: TripContext = { ...ctx, destination, origin };
  const settled = await Promise.allSettled(
    RESEARCH_TOPICS.map(async (topic) => {
      const response = await searchTavily(topic.query(topicCtx), { ...options, apiKey });
      return formatTopicSection(topic.title, response);
    }),
  );

  const sections: string[] = [];
  settled.forEach((outcome, i) => {
    const topic = RESEARCH_TOPICS[i];
    if (outcome.status === "rejected") {
      console.warn(`[Research] ${topic.id} query failed: ${errorMessage(outcome.reason)}`);
    } else if (outcome.value === null) {
      console.warn(`[Research] ${topic.id} query returned no content`);
    } else {
      sections.push(outcome.value);
    }
  });

  if (sections.length === 0) {
    throw new ResearchUnavailable(`No research results for ${destination}`);
  }

  console.log(`[Research] ${sections.length}/${RESEARCH_TOPICS.length} topics for ${destination}`);
  return sections.join("\n\n");
}

export function createResearchClient(options: ResearchOptions): ResearchFn {
  return (destination, origin, ctx) => researchDestination(destination, origin, ctx, options);
}
