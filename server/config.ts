/**
 * Runtime configuration, parsed once from the environment.
 *
 * Env vars:
 *   OPENAI_API_KEY          synthesis model key
 *   GOOGLE_PLACES_API_KEY   location discovery
 *   TAVILY_API_KEY          destination research
 *   AI_PREMIUM_MODEL        itinerary model (default: gpt-4o)
 *   RESEARCH_TIMEOUT_MS / RESEARCH_RETRIES
 *   PLACES_TIMEOUT_MS / PLACES_RETRIES
 *   SYNTHESIS_TIMEOUT_MS / SYNTHESIS_RETRIES
 *   PLACES_MAX_RESULTS      per-category record cap (default: 10)
 *   PORT                    http port (default: 5000)
 *
 * Missing API keys are allowed here: the adapter that needs one fails at
 * call time and the planner degrades (or fails, for synthesis).
 */

import { z } from "zod";

const optionalKey = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const timeoutMs = (fallback: number) => z.coerce.number().int().min(1000).max(300_000).default(fallback);
const retries = (fallback: number) => z.coerce.number().int().min(0).max(2).default(fallback);

const envSchema = z.object({
  OPENAI_API_KEY: optionalKey,
  GOOGLE_PLACES_API_KEY: optionalKey,
  TAVILY_API_KEY: optionalKey,
  AI_PREMIUM_MODEL: z.string().trim().min(1).default("gpt-4o"),
  RESEARCH_TIMEOUT_MS: timeoutMs(30_000),
  RESEARCH_RETRIES: retries(1),
  PLACES_TIMEOUT_MS: timeoutMs(15_000),
  PLACES_RETRIES: retries(1),
  SYNTHESIS_TIMEOUT_MS: timeoutMs(60_000),
  SYNTHESIS_RETRIES: retries(1),
  PLACES_MAX_RESULTS: z.coerce.number().int().min(1).max(20).default(10),
  PORT: z.coerce.number().int().min(1).max(65_535).default(5000),
});

export interface CallPolicy {
  timeoutMs: number;
  retries: number;
}

export interface AppConfig {
  openaiApiKey?: string;
  googlePlacesApiKey?: string;
  tavilyApiKey?: string;
  synthesisModel: string;
  research: CallPolicy;
  places: CallPolicy & { maxResultsPerCategory: number };
  synthesis: CallPolicy;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`[Config] Invalid environment: ${issues.join("; ")}`);
  }

  const e = parsed.data;
  return Object.freeze({
    openaiApiKey: e.OPENAI_API_KEY,
    googlePlacesApiKey: e.GOOGLE_PLACES_API_KEY,
    tavilyApiKey: e.TAVILY_API_KEY,
    synthesisModel: e.AI_PREMIUM_MODEL,
    research: { timeoutMs: e.RESEARCH_TIMEOUT_MS, retries: e.RESEARCH_RETRIES },
    places: {
      timeoutMs: e.PLACES_TIMEOUT_MS,
      retries: e.PLACES_RETRIES,
      maxResultsPerCategory: e.PLACES_MAX_RESULTS,
    },
    synthesis: { timeoutMs: e.SYNTHESIS_TIMEOUT_MS, retries: e.SYNTHESIS_RETRIES },
    port: e.PORT,
  });
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
