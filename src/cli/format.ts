/**
 * Plain-text rendering of traces and replay sessions
 */

import type { RunTrace } from "../orchestrator/core.js";
import type { ReplaySession } from "../replay/types.js";

export function formatVerdict(trace: RunTrace): string {
  const lines = [`Trace:      ${trace.traceId}`, `Issue:      ${trace.issueId}`, `Status:     ${trace.status}`];

  const output = trace.structuredOutput;
  if (output) {
    lines.push(
      `Type:       ${output.issue_type}`,
      `Resolution: ${output.resolution_type} (confidence ${output.confidence_score.toFixed(2)})`,
      `Escalate:   ${output.escalate ? `yes (${output.escalation_priority ?? "unspecified"})` : "no"}`,
    );
    if (output.policy_flags.length > 0) {
      lines.push(`Flags:      ${output.policy_flags.join(", ")}`);
    }
    lines.push("", `Root cause: ${output.root_cause}`, `Resolution: ${output.resolution}`);
    for (const step of output.next_steps) {
      lines.push(`  - ${step}`);
    }
  }

  if (trace.error) {
    lines.push(`Error:      [${trace.error.code}] ${trace.error.message}`);
  }

  if (trace.critic) {
    lines.push("", `Critic:     ${trace.critic.agrees ? "agrees" : "disagrees"} - ${trace.critic.notes}`);
  }

  lines.push(
    "",
    `${trace.turns} turns, ${trace.toolCalls.length} tool calls, ${trace.tokenUsage.totalTokens} tokens, ${trace.durationMs ?? 0}ms`,
  );
  return lines.join("\n");
}

export function formatTraceLine(trace: RunTrace): string {
  const output = trace.structuredOutput;
  const verdict = output ? `${output.resolution_type}${output.escalate ? " (escalated)" : ""}` : "-";
  const replay = trace.isReplay ? " [replay]" : "";
  return `${trace.traceId}  ${trace.issueId}  ${trace.status.padEnd(9)}  ${verdict}${replay}  ${trace.startedAt}`;
}

export function formatSession(session: ReplaySession): string {
  const score = session.stabilityScore === null ? "n/a" : session.stabilityScore.toFixed(3);
  const lines = [
    `Session:    ${session.sessionId}`,
    `Trace:      ${session.traceId}`,
    `Status:     ${session.status}`,
    `Original:   ${session.original.resolutionType} / escalate=${session.original.escalate}`,
    `Stability:  ${score} (${session.matches}/${session.nRuns} matched)`,
  ];
  if (session.error) {
    lines.push(`Error:      ${session.error}`);
  }

  for (const run of session.runs) {
    const verdict = run.resolutionType ? `${run.resolutionType} / escalate=${run.escalate}` : "no verdict";
    lines.push(
      "",
      `  #${run.index + 1} ${run.matchesOriginal ? "match" : "differs"}: ${verdict} [${run.paraphraseSource}]`,
      `     ${run.perturbation}`,
    );
    if (run.error) {
      lines.push(`     error: ${run.error}`);
    }
  }
  return lines.join("\n");
}
