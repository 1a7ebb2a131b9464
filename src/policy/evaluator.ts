/**
 * Confidence and policy evaluator
 *
 * Deterministic rule checks over the structured output. Runs after the model
 * has submitted its verdict and may only add flags or force escalation.
 */

import type { OutputField, PolicyConfig, PolicyRule, RuleCondition } from "../config/types.js";
import type { PolicyOutcome } from "../orchestrator/core.js";
import type { EscalationPriority, StructuredOutput } from "../orchestrator/terminal.js";

export const MANDATORY_ESCALATION = "MANDATORY_ESCALATION";
export const LOW_CONFIDENCE_AUTO_RESOLVE = "LOW_CONFIDENCE_AUTO_RESOLVE";
export const MAX_TURNS_EXCEEDED = "MAX_TURNS_EXCEEDED";

export const DEFAULT_LOW_CONFIDENCE_THRESHOLD = 0.6;

/** Issue types that always mean suspected unauthorized activity */
export const FRAUD_ISSUE_TYPES = ["UNAUTH_TRADE", "UNAUTH_ACCESS", "ACCOUNT_TAKEOVER"];
export const FRAUD_FLAGS = ["FRAUD_SUSPECTED", "UNAUTHORIZED_ACTIVITY"];

export const OVER_CONTRIBUTION_ISSUE_TYPES = ["RRSP_OVER", "TFSA_OVER"];
export const OVER_CONTRIBUTION_FLAGS = ["OVER_CONTRIBUTION_RISK"];

export const COMPLIANCE_HOLD_FLAGS = ["COMPLIANCE_BLOCK", "LEGAL_HOLD"];

/**
 * Built-in escalation table. Matches codes only; the free-text fields are
 * left alone so a verdict that rules a risk out is not escalated for naming it.
 */
export const DEFAULT_POLICY_RULES: PolicyRule[] = [
  {
    id: "fraud-signal",
    description: "Suspected unauthorized access or trading must go to the security team",
    when: {
      type: "any",
      conditions: [
        { type: "issue_type", in: FRAUD_ISSUE_TYPES },
        { type: "flag_present", flags: FRAUD_FLAGS },
      ],
    },
    flags: [MANDATORY_ESCALATION],
    forceEscalate: true,
    escalationPriority: "HIGH",
  },
  {
    id: "low-confidence-auto-resolve",
    description: "Auto-resolution below the confidence threshold needs a human",
    when: {
      type: "all",
      conditions: [{ type: "resolution_type", equals: "AUTO_RESOLVED" }, { type: "confidence_below" }],
    },
    flags: [LOW_CONFIDENCE_AUTO_RESOLVE],
    forceEscalate: true,
    escalationPriority: "MEDIUM",
  },
  {
    id: "over-contribution",
    description: "Registered plan over-contribution requires Notice of Assessment confirmation",
    when: {
      type: "any",
      conditions: [
        { type: "issue_type", in: OVER_CONTRIBUTION_ISSUE_TYPES },
        { type: "flag_present", flags: OVER_CONTRIBUTION_FLAGS },
      ],
    },
    flags: [MANDATORY_ESCALATION],
    forceEscalate: true,
    escalationPriority: "HIGH",
  },
  {
    id: "compliance-hold",
    description: "Compliance blocks and legal holds are never discussed; escalate",
    when: { type: "flag_present", flags: COMPLIANCE_HOLD_FLAGS },
    flags: [MANDATORY_ESCALATION],
    forceEscalate: true,
    escalationPriority: "HIGH",
  },
  {
    id: "declared-mandatory-escalation",
    description: "A verdict carrying MANDATORY_ESCALATION is always escalated",
    when: { type: "flag_present", flags: [MANDATORY_ESCALATION] },
    flags: [],
    forceEscalate: true,
    escalationPriority: "HIGH",
  },
];

export interface PolicyEvaluation {
  matchedRules: string[];
  /** Flags the output does not already carry */
  flags: string[];
  forceEscalate: boolean;
  escalationPriority?: EscalationPriority;
}

const PRIORITY_RANK: Record<EscalationPriority, number> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
  CRITICAL: 3,
};

function fieldText(output: StructuredOutput, field: OutputField): string {
  const value = output[field];
  return (Array.isArray(value) ? value.join(" ") : value).toLowerCase();
}

function normalizeCode(code: string): string {
  return code.trim().toUpperCase();
}

function codeIn(code: string, codes: string[]): boolean {
  const normalized = normalizeCode(code);
  return codes.some((candidate) => normalizeCode(candidate) === normalized);
}

export class PolicyEvaluator {
  private readonly rules: PolicyRule[];
  private readonly threshold: number;

  constructor(config?: Partial<PolicyConfig>) {
    this.rules = config?.rules ?? DEFAULT_POLICY_RULES;
    this.threshold = config?.lowConfidenceThreshold ?? DEFAULT_LOW_CONFIDENCE_THRESHOLD;
  }

  listRules(): PolicyRule[] {
    return [...this.rules];
  }

  /**
   * Match every rule against the output as submitted
   */
  evaluate(output: StructuredOutput): PolicyEvaluation {
    const matchedRules: string[] = [];
    const flags: string[] = [];
    let forceEscalate = false;
    let escalationPriority: EscalationPriority | undefined;

    for (const rule of this.rules) {
      if (!this.matches(rule.when, output)) continue;

      matchedRules.push(rule.id);
      for (const flag of rule.flags) {
        if (!output.policy_flags.includes(flag) && !flags.includes(flag)) {
          flags.push(flag);
        }
      }
      if (rule.forceEscalate) {
        forceEscalate = true;
        const priority = rule.escalationPriority;
        if (priority && (!escalationPriority || PRIORITY_RANK[priority] > PRIORITY_RANK[escalationPriority])) {
          escalationPriority = priority;
        }
      }
    }

    return { matchedRules, flags, forceEscalate, escalationPriority };
  }

  /**
   * Return the output with rule flags and escalation stamped on.
   * A model-declared escalation or priority is never removed.
   */
  apply(output: StructuredOutput): { output: StructuredOutput; outcome: PolicyOutcome } {
    const evaluation = this.evaluate(output);
    const escalate = output.escalate || evaluation.forceEscalate;

    const stamped: StructuredOutput = {
      ...output,
      policy_flags: [...output.policy_flags, ...evaluation.flags],
      escalate,
      escalation_priority:
        output.escalation_priority ?? (evaluation.forceEscalate ? evaluation.escalationPriority : undefined),
    };

    return {
      output: stamped,
      outcome: {
        matchedRules: evaluation.matchedRules,
        flagsAdded: evaluation.flags,
        forcedEscalation: evaluation.forceEscalate && !output.escalate,
      },
    };
  }

  private matches(condition: RuleCondition, output: StructuredOutput): boolean {
    switch (condition.type) {
      case "keywords": {
        const haystack = condition.fields.map((field) => fieldText(output, field)).join("\n");
        return condition.any.some((keyword) => haystack.includes(keyword.toLowerCase()));
      }
      case "issue_type":
        return codeIn(output.issue_type, condition.in);
      case "confidence_below":
        return output.confidence_score < (condition.threshold ?? this.threshold);
      case "resolution_type":
        return output.resolution_type === condition.equals;
      case "flag_present":
        return output.policy_flags.some((flag) => codeIn(flag, condition.flags));
      case "all":
        return condition.conditions.every((inner) => this.matches(inner, output));
      case "any":
        return condition.conditions.some((inner) => this.matches(inner, output));
    }
  }
}
