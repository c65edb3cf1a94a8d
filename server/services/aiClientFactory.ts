/**
 * AI Client Factory: one OpenAI client per API key, plus the text generator
 * the synthesis step calls.
 *
 * Timeout and retry count come from config (SYNTHESIS_TIMEOUT_MS,
 * SYNTHESIS_RETRIES) and are passed per request, so SDK defaults never apply.
 */

import OpenAI from "openai";
import type { CallPolicy } from "../config";

// ============================================================================
// TYPES
// ============================================================================

export interface GenerationPrompt {
  system: string;
  user: string;
}

/** Returns the raw model text; empty string when the model said nothing. */
export type TextGenerator = (prompt: GenerationPrompt) => Promise<string>;

export interface AIClientOptions {
  apiKey?: string;
  model: string;
  policy: CallPolicy;
  temperature?: number;
}

// ============================================================================
// SINGLETON CACHE (one OpenAI instance per key)
// ============================================================================

const clientCache = new Map<string, OpenAI>();

function getOrCreateOpenAI(apiKey: string): OpenAI {
  let client = clientCache.get(apiKey);
  if (!client) {
    client = new OpenAI({ apiKey });
    clientCache.set(apiKey, client);
  }
  return client;
}

// ============================================================================
// PUBLIC API
// ============================================================================

export function isAIConfigured(apiKey: string | undefined): boolean {
  return !!apiKey;
}

export function createOpenAIGenerator(options: AIClientOptions): TextGenerator {
  return async (prompt) => {
    if (!options.apiKey) {
      throw new Error("[AIClientFactory] No AI API key configured. Set OPENAI_API_KEY.");
    }

    const openai = getOrCreateOpenAI(options.apiKey);
    const completion = await openai.chat.completions.create(
      {
        model: options.model,
        temperature: options.temperature ?? 0.7,
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
      },
      {
        timeout: options.policy.timeoutMs,
        maxRetries: options.policy.retries,
      },
    );

    return completion.choices[0]?.message?.content ?? "";
  };
}
