/**
 * Critic reviewer - independent audit of a verdict by a second model call
 */

import { z } from "zod";
import type { CompletionProvider } from "../completion/types.js";
import { parseJsonReply } from "../completion/types.js";
import { errorMessage } from "../errors.js";
import type { CasetrailLogger } from "../runtime/logger.js";
import type { CriticVerdict } from "./core.js";
import { withTimeout } from "./core.js";
import { CRITIC_SYSTEM_PROMPT } from "./prompts.js";
import type { StructuredOutput } from "./terminal.js";

export const CRITIC_UNAVAILABLE_NOTE = "Critic review unavailable.";

/** Characters of the reasoning trail shown to the critic */
const REASONING_EXCERPT_CHARS = 600;

const CriticReplySchema = z.object({
  agrees: z.boolean().default(true),
  note: z.string().default(""),
});

export interface CriticInput {
  issueId: string;
  structuredOutput: StructuredOutput;
  reasoning: string;
}

export interface CriticReviewerOptions {
  provider: CompletionProvider;
  model: string;
  logger: CasetrailLogger;
  timeoutMs?: number;
}

export class CriticReviewer {
  private readonly provider: CompletionProvider;
  private readonly model: string;
  private readonly logger: CasetrailLogger;
  private readonly timeoutMs: number;

  constructor(options: CriticReviewerOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  /**
   * Review a verdict. Never throws; failures yield the unavailable fallback.
   */
  async review(input: CriticInput): Promise<CriticVerdict> {
    const context = [
      `Issue ID: ${input.issueId}`,
      "",
      "Agent verdict:",
      JSON.stringify(input.structuredOutput, null, 2),
      "",
      "Agent reasoning (excerpt):",
      input.reasoning.slice(0, REASONING_EXCERPT_CHARS),
    ].join("\n");

    try {
      const response = await withTimeout("Critic review", this.timeoutMs, (signal) =>
        this.provider.complete({
          system: CRITIC_SYSTEM_PROMPT,
          conversation: [{ role: "user", content: context }],
          tools: [],
          model: this.model,
          maxTokens: 300,
          signal,
        }),
      );

      const reply = CriticReplySchema.safeParse(parseJsonReply(response.text, "object"));
      if (!reply.success) {
        this.logger.warn("Critic reply could not be parsed", {
          issueId: input.issueId,
          preview: response.text.slice(0, 120),
        });
        return this.unavailable();
      }

      return {
        agrees: reply.data.agrees,
        notes: reply.data.note,
        model: response.model,
        available: true,
      };
    } catch (error) {
      this.logger.warn("Critic review failed", { issueId: input.issueId, error: errorMessage(error) });
      return this.unavailable();
    }
  }

  private unavailable(): CriticVerdict {
    return {
      agrees: true,
      notes: CRITIC_UNAVAILABLE_NOTE,
      model: this.model,
      available: false,
    };
  }
}
