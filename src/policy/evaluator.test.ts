/**
 * Tests for the escalation policy evaluator
 */

import { describe, it, expect } from "vitest";
import { parseTerminalPayload } from "../orchestrator/terminal.js";
import { AML_HOLD_OUTPUT, UNAUTHORIZED_TRADE_OUTPUT } from "../testing/fakes.js";
import {
  PolicyEvaluator,
  DEFAULT_POLICY_RULES,
  LOW_CONFIDENCE_AUTO_RESOLVE,
  MANDATORY_ESCALATION,
} from "./evaluator.js";

describe("PolicyEvaluator", () => {
  const evaluator = new PolicyEvaluator();

  it("leaves a confident routine resolution untouched", () => {
    const input = parseTerminalPayload(AML_HOLD_OUTPUT);
    const { output, outcome } = evaluator.apply(input);

    expect(outcome).toEqual({ matchedRules: [], flagsAdded: [], forcedEscalation: false });
    expect(output.escalate).toBe(false);
    expect(output.escalation_priority).toBeUndefined();
    expect(output.policy_flags).toEqual(["AML_REVIEW_TRIGGERED"]);
  });

  it("forces escalation for suspected unauthorized trading", () => {
    const { output, outcome } = evaluator.apply(parseTerminalPayload(UNAUTHORIZED_TRADE_OUTPUT));

    expect(outcome).toEqual({
      matchedRules: ["fraud-signal"],
      flagsAdded: [MANDATORY_ESCALATION],
      forcedEscalation: true,
    });
    expect(output.escalate).toBe(true);
    expect(output.escalation_priority).toBe("HIGH");
    expect(output.policy_flags).toEqual([MANDATORY_ESCALATION]);
  });

  it("does not escalate a verdict whose text rules fraud out", () => {
    const { output, outcome } = evaluator.apply(
      parseTerminalPayload({
        ...AML_HOLD_OUTPUT,
        resolution: "Hold is a routine AML review; no indication of fraud or unauthorized activity.",
      }),
    );

    expect(outcome).toEqual({ matchedRules: [], flagsAdded: [], forcedEscalation: false });
    expect(output.escalate).toBe(false);
    expect(output.policy_flags).toEqual(["AML_REVIEW_TRIGGERED"]);
  });

  it("does not escalate a verdict whose text rules an over-contribution out", () => {
    const evaluation = evaluator.evaluate(
      parseTerminalPayload({
        issue_type: "TAX_SLIP",
        root_cause: "No over-contribution: the RRSP deduction limit was not exceeded.",
        resolution_type: "AUTO_RESOLVED",
        confidence_score: 0.9,
        escalate: false,
      }),
    );

    expect(evaluation.matchedRules).toEqual([]);
    expect(evaluation.forceEscalate).toBe(false);
  });

  it("matches risk codes in policy flags regardless of case", () => {
    const fraud = evaluator.evaluate(parseTerminalPayload({ ...AML_HOLD_OUTPUT, policy_flags: ["fraud_suspected"] }));
    const hold = evaluator.evaluate(parseTerminalPayload({ ...AML_HOLD_OUTPUT, policy_flags: ["LEGAL_HOLD"] }));

    expect(fraud.matchedRules).toEqual(["fraud-signal"]);
    expect(hold.matchedRules).toEqual(["compliance-hold"]);
    expect(hold.flags).toEqual([MANDATORY_ESCALATION]);
  });

  it("keeps a priority the model already declared", () => {
    const { output, outcome } = evaluator.apply(
      parseTerminalPayload({ ...UNAUTHORIZED_TRADE_OUTPUT, escalate: true, escalation_priority: "CRITICAL" }),
    );

    expect(output.escalation_priority).toBe("CRITICAL");
    expect(outcome.forcedEscalation).toBe(false);
  });

  it("escalates low-confidence auto-resolutions", () => {
    const { output, outcome } = evaluator.apply(
      parseTerminalPayload({ ...AML_HOLD_OUTPUT, confidence_score: 0.4 }),
    );

    expect(outcome.matchedRules).toEqual(["low-confidence-auto-resolve"]);
    expect(output.policy_flags).toEqual(["AML_REVIEW_TRIGGERED", LOW_CONFIDENCE_AUTO_RESOLVE]);
    expect(output.escalate).toBe(true);
    expect(output.escalation_priority).toBe("MEDIUM");
  });

  it("honours a custom confidence threshold", () => {
    const strict = new PolicyEvaluator({ lowConfidenceThreshold: 0.95 });
    const { outcome } = strict.apply(parseTerminalPayload(AML_HOLD_OUTPUT));
    expect(outcome.matchedRules).toEqual(["low-confidence-auto-resolve"]);
  });

  it("escalates registered plan over-contributions", () => {
    const evaluation = evaluator.evaluate(
      parseTerminalPayload({
        issue_type: "RRSP_OVER",
        resolution_type: "CORRECTED",
        confidence_score: 0.8,
        escalate: false,
      }),
    );

    expect(evaluation.matchedRules).toEqual(["over-contribution"]);
    expect(evaluation.flags).toEqual([MANDATORY_ESCALATION]);
    expect(evaluation.escalationPriority).toBe("HIGH");
  });

  it("does not duplicate a flag the output already carries", () => {
    const evaluation = evaluator.evaluate(
      parseTerminalPayload({ ...UNAUTHORIZED_TRADE_OUTPUT, policy_flags: [MANDATORY_ESCALATION] }),
    );

    expect(evaluation.matchedRules).toEqual(["fraud-signal", "declared-mandatory-escalation"]);
    expect(evaluation.flags).toEqual([]);
    expect(evaluation.forceEscalate).toBe(true);
  });

  it("replaces the built-in table with configured rules", () => {
    const custom = new PolicyEvaluator({
      rules: [
        {
          id: "wire-watch",
          description: "Track wire holds",
          when: { type: "keywords", fields: ["root_cause"], any: ["WIRE"] },
          flags: ["WIRE_WATCH"],
          forceEscalate: false,
        },
      ],
    });

    const { output, outcome } = custom.apply(parseTerminalPayload(AML_HOLD_OUTPUT));

    expect(custom.listRules()).toHaveLength(1);
    expect(outcome.matchedRules).toEqual(["wire-watch"]);
    expect(output.policy_flags).toEqual(["AML_REVIEW_TRIGGERED", "WIRE_WATCH"]);
    expect(output.escalate).toBe(false);
  });

  it("lists the built-in rules by default", () => {
    expect(evaluator.listRules().map((rule) => rule.id)).toEqual(DEFAULT_POLICY_RULES.map((rule) => rule.id));
  });
});
