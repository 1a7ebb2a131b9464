/**
 * One-line summaries of tool results for the audit trail
 */

import { isToolError, type ToolResult } from "./types.js";

function count(result: Record<string, unknown>): number {
  return typeof result.count === "number" ? result.count : 0;
}

function text(value: unknown): string {
  if (value === undefined || value === null) return "";
  return typeof value === "string" ? value : JSON.stringify(value);
}

function records(value: unknown): Record<string, unknown>[] {
  if (!Array.isArray(value)) return [];
  return value.filter(
    (item): item is Record<string, unknown> => typeof item === "object" && item !== null,
  );
}

/**
 * Summarize a tool result. Never includes raw arguments.
 */
export function summarizeToolResult(tool: string, result: ToolResult): string {
  if (isToolError(result)) {
    return `ERROR: ${result.error.message}`;
  }

  switch (tool) {
    case "customer_lookup":
      return `Customer: ${text(result.name)} | KYC: ${text(result.kyc_status)}`;

    case "account_lookup": {
      const statuses = records(result.accounts).map((a) => text(a.status));
      return `${count(result)} account(s) | statuses: [${statuses.join(", ")}]`;
    }

    case "account_login_history": {
      const countries = Array.isArray(result.unique_countries) ? result.unique_countries : [];
      return `${count(result)} events | countries: [${countries.map(text).join(", ")}]`;
    }

    case "account_communication_history":
      return `${count(result)} communication(s)`;

    case "transactions_search": {
      const filters =
        typeof result.filters === "object" && result.filters !== null ? result.filters : null;
      const type = filters && "transaction_type" in filters ? text(filters.transaction_type) : "";
      const status = filters && "status" in filters ? text(filters.status) : "";
      return `${count(result)} transaction(s) | type=${type || "any"} status=${status || "any"}`;
    }

    case "transactions_metadata":
      return `tx ${text(result.transaction_id).slice(0, 8)}... | ${text(result.status)} | ${text(result.amount)} ${text(result.currency)}`;

    case "policy_search":
      return `${count(result)} policy chunk(s) for: '${text(result.query).slice(0, 40)}'`;

    case "cases_similar":
      return `${count(result)} similar case(s)`;

    default:
      return `${Object.keys(result).length} field(s) returned`;
  }
}
