/**
 * Terminal interceptor
 *
 * `submit_resolution` is recognized by name, validated, and turned into the
 * run's structured output. It is never dispatched.
 */

import { z } from "zod";
import { MalformedTerminalOutputError } from "../errors.js";
import type { ModelAction, ToolCallRequest } from "../completion/types.js";
import { TERMINAL_TOOL_NAME, type ToolSpec } from "../tools/types.js";

export const RESOLUTION_TYPES = ["AUTO_RESOLVED", "ESCALATED", "REFUNDED", "CORRECTED"] as const;
export const ESCALATION_PRIORITIES = ["LOW", "MEDIUM", "HIGH", "CRITICAL"] as const;

export const ResolutionTypeSchema = z.enum(RESOLUTION_TYPES);
export const EscalationPrioritySchema = z.enum(ESCALATION_PRIORITIES);

export type ResolutionType = z.infer<typeof ResolutionTypeSchema>;
export type EscalationPriority = z.infer<typeof EscalationPrioritySchema>;

/**
 * Terminal payload. Fields the model adds beyond these are kept as-is.
 */
export const StructuredOutputSchema = z
  .object({
    issue_type: z.string().default("GENERAL"),
    root_cause: z.string().default(""),
    resolution: z.string().default(""),
    resolution_type: ResolutionTypeSchema,
    next_steps: z.array(z.string()).default([]),
    confidence_score: z.number().finite().min(0).max(1),
    escalate: z.boolean(),
    escalation_priority: EscalationPrioritySchema.nullish().transform((value) => value ?? undefined),
    policy_flags: z.array(z.string()).default([]),
  })
  .passthrough();

export type StructuredOutput = z.infer<typeof StructuredOutputSchema>;

/**
 * Tool spec appended to the catalog specs for completion requests only
 */
export const SUBMIT_RESOLUTION_SPEC: ToolSpec = {
  name: TERMINAL_TOOL_NAME,
  description:
    "Submit the final investigation resolution. Call this ONLY when the investigation is " +
    "complete. This closes the investigation; do not call any other tools after it.",
  inputSchema: {
    type: "object",
    properties: {
      issue_type: {
        type: "string",
        description:
          "Classified issue type: WIRE_DELAY, RRSP_OVER, UNAUTH_TRADE, TAX_SLIP, " +
          "ETRANSFER_FAIL, KYC_EXPIRED, ACCOUNT_FROZEN, or GENERAL.",
      },
      root_cause: { type: "string", description: "Concise explanation of the root cause." },
      resolution: { type: "string", description: "What was determined and what happens next." },
      resolution_type: {
        type: "string",
        enum: [...RESOLUTION_TYPES],
        description: "Resolution outcome category.",
      },
      next_steps: {
        type: "array",
        items: { type: "string" },
        description: "Ordered list of concrete next steps.",
      },
      confidence_score: {
        type: "number",
        description: "Confidence in this resolution, between 0.0 and 1.0.",
      },
      escalate: {
        type: "boolean",
        description:
          "True if the issue requires human review. MUST be true for suspected fraud, " +
          "tax advice, over-contributions, or insufficient data.",
      },
      escalation_priority: {
        type: "string",
        enum: [...ESCALATION_PRIORITIES],
        description: "Escalation priority. Required when escalate=true.",
      },
      policy_flags: {
        type: "array",
        items: { type: "string" },
        description: "Policy flag codes triggered during the investigation.",
      },
    },
    required: [
      "issue_type",
      "root_cause",
      "resolution",
      "resolution_type",
      "next_steps",
      "confidence_score",
      "escalate",
      "policy_flags",
    ],
  },
};

/**
 * Validate a terminal payload. Out-of-range confidence is rejected, not clamped.
 */
export function parseTerminalPayload(payload: Record<string, unknown>): StructuredOutput {
  const result = StructuredOutputSchema.safeParse(payload);
  if (!result.success) {
    throw new MalformedTerminalOutputError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "payload"}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Return the structured output if the action is the terminal call, null otherwise
 */
export function interceptTerminal(action: ModelAction): StructuredOutput | null {
  if (action.type !== "tool_call" || action.call.name !== TERMINAL_TOOL_NAME) {
    return null;
  }
  return parseTerminalPayload(action.call.arguments);
}

/**
 * What the loop does next. Only `tool` actions reach the dispatcher.
 */
export type NextAction =
  | { kind: "tool"; call: ToolCallRequest }
  | { kind: "terminal"; callId: string; output: StructuredOutput }
  | { kind: "text"; text: string };

export function resolveNextAction(action: ModelAction): NextAction {
  if (action.type === "final_answer") {
    return { kind: "text", text: action.text };
  }
  const output = interceptTerminal(action);
  if (output) {
    return { kind: "terminal", callId: action.call.callId, output };
  }
  return { kind: "tool", call: action.call };
}
