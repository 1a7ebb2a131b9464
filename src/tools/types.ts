/**
 * Tool types and the declared tool catalog
 */

/**
 * Name of the reserved terminal tool. It is only ever presented to the
 * completion capability, never to the catalog or any tool registry.
 */
export const TERMINAL_TOOL_NAME = "submit_resolution";

/**
 * Standard error codes
 */
export enum ToolErrorCode {
  UNKNOWN_TOOL = "UNKNOWN_TOOL",
  INVALID_ARGUMENTS = "INVALID_ARGUMENTS",
  NOT_FOUND = "NOT_FOUND",
  TIMEOUT = "TIMEOUT",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/**
 * Structured tool error
 */
export interface ToolError {
  error: {
    code: ToolErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * JSON payload returned by a tool
 */
export type ToolPayload = Record<string, unknown>;

/**
 * Tool result type - either success or error
 */
export type ToolResult<T = ToolPayload> = T | ToolError;

/**
 * Check if result is an error
 */
export function isToolError(result: unknown): result is ToolError {
  if (typeof result !== "object" || result === null || !("error" in result)) {
    return false;
  }
  const { error } = result;
  return typeof error === "object" && error !== null && "code" in error && "message" in error;
}

/**
 * Create a tool error
 */
export function createToolError(
  code: ToolErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ToolError {
  return {
    error: {
      code,
      message,
      ...(details ? { details } : {}),
    },
  };
}

/**
 * Cache classification. Selects the TTL tier:
 * lookup (point reads), similarity (vector search), reference (static policy text).
 */
export type ToolClass = "lookup" | "similarity" | "reference";

export type ToolInputSchema = {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
};

/**
 * Declared capability
 */
export interface ToolCatalogEntry {
  name: string;
  description: string;
  toolClass: ToolClass;
  /** A failure of a non-recoverable tool aborts the investigation */
  recoverable: boolean;
  inputSchema: ToolInputSchema;
}

/**
 * Tool spec as presented to the completion capability
 */
export interface ToolSpec {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

/**
 * A tool collaborator. One per declared tool name.
 */
export interface ToolCollaborator {
  invoke(args: Record<string, unknown>, signal: AbortSignal): Promise<ToolResult>;
}

/**
 * Immutable tool catalog, constructed once per process and passed in
 */
export class ToolCatalog {
  private readonly entries: ReadonlyMap<string, ToolCatalogEntry>;

  constructor(entries: ToolCatalogEntry[]) {
    const map = new Map<string, ToolCatalogEntry>();
    for (const entry of entries) {
      if (entry.name === TERMINAL_TOOL_NAME) {
        throw new Error(`"${TERMINAL_TOOL_NAME}" is reserved and cannot be declared as a tool`);
      }
      if (map.has(entry.name)) {
        throw new Error(`Duplicate tool declaration: ${entry.name}`);
      }
      map.set(entry.name, Object.freeze({ ...entry }));
    }
    this.entries = map;
  }

  get(name: string): ToolCatalogEntry | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  list(): ToolCatalogEntry[] {
    return Array.from(this.entries.values());
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Specs for every declared tool. Never includes the terminal tool.
   */
  specs(): ToolSpec[] {
    return this.list().map((entry) => ({
      name: entry.name,
      description: entry.description,
      inputSchema: entry.inputSchema,
    }));
  }
}

// ============================================================
// Default catalog
// ============================================================

export const DEFAULT_TOOL_CATALOG: ToolCatalogEntry[] = [
  {
    name: "customer_lookup",
    description:
      "Look up a customer's profile: name, province, KYC status, KYC expiry date, risk profile. " +
      "Call this first to understand who the customer is.",
    toolClass: "lookup",
    recoverable: true,
    inputSchema: {
      type: "object",
      properties: {
        customer_id: { type: "string", description: "Customer identifier" },
      },
      required: ["customer_id"],
    },
  },
  {
    name: "account_lookup",
    description:
      "Retrieve all accounts held by a customer: type, status (active/frozen/restricted), " +
      "freeze reason, balances and year-to-date RRSP/TFSA contributions.",
    toolClass: "lookup",
    recoverable: true,
    inputSchema: {
      type: "object",
      properties: {
        customer_id: { type: "string", description: "Customer identifier" },
      },
      required: ["customer_id"],
    },
  },
  {
    name: "account_login_history",
    description:
      "Recent login events with device, IP country and timestamp. Use when investigating " +
      "suspected unauthorized access. Returns unique_countries and unique_devices.",
    toolClass: "lookup",
    recoverable: true,
    inputSchema: {
      type: "object",
      properties: {
        customer_id: { type: "string", description: "Customer identifier" },
        days: { type: "number", description: "Window in days (max 90)", default: 30 },
      },
      required: ["customer_id"],
    },
  },
  {
    name: "account_communication_history",
    description:
      "Recent communications sent to the customer (email, SMS, push) with subject and summary.",
    toolClass: "lookup",
    recoverable: true,
    inputSchema: {
      type: "object",
      properties: {
        customer_id: { type: "string", description: "Customer identifier" },
      },
      required: ["customer_id"],
    },
  },
  {
    name: "transactions_search",
    description:
      "Search an account's transactions with optional type and status filters within a window of days.",
    toolClass: "lookup",
    recoverable: true,
    inputSchema: {
      type: "object",
      properties: {
        account_id: { type: "string", description: "Account identifier" },
        transaction_type: {
          type: "string",
          description:
            "deposit | withdrawal | wire_in | wire_out | transfer_in | transfer_out | trade_buy | trade_sell | dividend | drip | etransfer",
        },
        status: {
          type: "string",
          description: "completed | pending | processing | failed | reversed | pending_reversal",
        },
        days: { type: "number", description: "Window in days (max 365)", default: 90 },
        year: {
          type: "number",
          description: "Calendar year (e.g. 2024). Filters Jan 1 to Dec 31 and ignores days.",
        },
      },
      required: ["account_id"],
    },
  },
  {
    name: "transactions_metadata",
    description:
      "Full metadata for one transaction: device, IP country, instrument, quantity, unit price.",
    toolClass: "lookup",
    recoverable: true,
    inputSchema: {
      type: "object",
      properties: {
        transaction_id: { type: "string", description: "Transaction identifier" },
      },
      required: ["transaction_id"],
    },
  },
  {
    name: "policy_search",
    description:
      "Search the internal policy knowledge base for rules, procedures and thresholds. " +
      "Always search policy before making a resolution decision.",
    toolClass: "reference",
    recoverable: true,
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "What to look up" },
        category: {
          type: "string",
          description: "WIRE | TAX | SECURITY | PAYMENT | COMPLIANCE | TRADING",
        },
        top_k: { type: "number", description: "Number of chunks (max 5)", default: 3 },
      },
      required: ["query"],
    },
  },
  {
    name: "cases_similar",
    description:
      "Search historical resolved cases similar to the issue, with their resolution type and confidence.",
    toolClass: "similarity",
    recoverable: true,
    inputSchema: {
      type: "object",
      properties: {
        issue_description: { type: "string", description: "Short description of the issue" },
        top_k: { type: "number", description: "Number of cases (max 5)", default: 3 },
      },
      required: ["issue_description"],
    },
  },
];
