/**
 * Paraphrase generation for replay variants
 */

import type { CompletionProvider } from "../completion/types.js";
import { errorMessage } from "../errors.js";
import { withTimeout } from "../orchestrator/core.js";
import { PARAPHRASE_SYSTEM_PROMPT } from "../orchestrator/prompts.js";
import type { CasetrailLogger } from "../runtime/logger.js";
import type { ParaphraseSource } from "./types.js";

/** Wording styles requested from the model, one per variant */
export const PARAPHRASE_STYLES = [
  "formal and detailed",
  "casual and brief",
  "frustrated and urgent",
  "calm and polite",
  "terse, in as few sentences as possible",
  "uncertain, phrased as questions",
] as const;

/** Rule-based variants used when the model call fails */
export const FALLBACK_TEMPLATES = [
  (message: string) => `Hi support team, I need help with the following: ${message}`,
  (message: string) => `To whom it may concern: ${message} Please advise on next steps.`,
  (message: string) =>
    `Hello, I'm reaching out regarding an issue. ${message} Appreciate your assistance.`,
  (message: string) => `I wanted to follow up on this matter urgently. ${message}`,
  (message: string) => `Good day. I have a concern I need resolved: ${message} Thank you.`,
] as const;

export interface Paraphrase {
  text: string;
  source: ParaphraseSource;
  style: string;
}

/**
 * Small seeded PRNG (mulberry32). Returns floats in [0, 1).
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffled<T>(items: readonly T[], random: () => number): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Rule-based variants. Without a seed the templates are used in order.
 */
export function fallbackParaphrases(message: string, n: number, seed?: number): string[] {
  const templates =
    seed === undefined ? [...FALLBACK_TEMPLATES] : shuffled(FALLBACK_TEMPLATES, mulberry32(seed));
  return Array.from({ length: n }, (_, i) => templates[i % templates.length](message));
}

export interface ParaphraseGeneratorOptions {
  provider: CompletionProvider;
  model: string;
  logger: CasetrailLogger;
  timeoutMs?: number;
}

export class ParaphraseGenerator {
  private readonly provider: CompletionProvider;
  private readonly model: string;
  private readonly logger: CasetrailLogger;
  private readonly timeoutMs: number;

  constructor(options: ParaphraseGeneratorOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  /**
   * Generate `n` variants, one completion each. A variant whose call fails
   * falls back to its rule-based template. A seed fixes the styles and the
   * templates, and requests temperature 0.
   */
  async generate(message: string, n: number, seed?: number): Promise<Paraphrase[]> {
    const random = seed === undefined ? Math.random : mulberry32(seed);
    const styles = shuffled(PARAPHRASE_STYLES, random);
    const fallbacks = fallbackParaphrases(message, n, seed);

    return Promise.all(
      Array.from({ length: n }, async (_, index): Promise<Paraphrase> => {
        const style = styles[index % styles.length];
        try {
          const text = await this.paraphrase(message, style, seed !== undefined);
          return { text, source: "model", style };
        } catch (error) {
          this.logger.warn("Paraphrase generation failed; using fallback", {
            index,
            error: errorMessage(error),
          });
          return { text: fallbacks[index], source: "fallback", style: "template" };
        }
      }),
    );
  }

  private async paraphrase(message: string, style: string, deterministic: boolean): Promise<string> {
    const response = await withTimeout("Paraphrase", this.timeoutMs, (signal) =>
      this.provider.complete({
        system: PARAPHRASE_SYSTEM_PROMPT,
        conversation: [
          { role: "user", content: `Style: ${style}\n\nMessage:\n${message}` },
        ],
        tools: [],
        model: this.model,
        maxTokens: 800,
        ...(deterministic ? { temperature: 0 } : {}),
        signal,
      }),
    );

    const text = response.text.trim().replace(/^"(.*)"$/s, "$1").trim();
    if (!text) {
      throw new Error("Empty paraphrase");
    }
    return text;
  }
}
