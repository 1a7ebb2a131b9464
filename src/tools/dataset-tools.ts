/**
 * Tool collaborators backed by a case dataset
 */

import { z } from "zod";
import type { CaseDataset } from "./dataset.js";
import {
  type ToolCollaborator,
  type ToolResult,
  ToolErrorCode,
  createToolError,
} from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

const STOP_WORDS = new Set([
  "the", "and", "for", "with", "that", "this", "from", "have", "has", "was", "are", "but",
  "not", "you", "your", "my", "our", "its", "into", "been", "why", "what", "when", "how",
]);

/**
 * Lowercase word tokens used for keyword-overlap similarity
 */
export function tokenize(text: string): Set<string> {
  const words = text.toLowerCase().match(/[a-z0-9_]+/g) ?? [];
  return new Set(words.filter((word) => word.length > 2 && !STOP_WORDS.has(word)));
}

/**
 * Share of query tokens present in the document, rounded to 3 decimals
 */
export function overlapScore(query: Set<string>, document: string): number {
  if (query.size === 0) return 0;
  const docTokens = tokenize(document);
  let shared = 0;
  for (const token of query) {
    if (docTokens.has(token)) shared++;
  }
  return Math.round((shared / query.size) * 1000) / 1000;
}

function byNewest<T>(key: (item: T) => string): (a: T, b: T) => number {
  return (a, b) => Date.parse(key(b)) - Date.parse(key(a));
}

function collaborator<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  handler: (input: T) => ToolResult,
): ToolCollaborator {
  return {
    async invoke(args, signal) {
      if (signal.aborted) {
        return createToolError(ToolErrorCode.TIMEOUT, "Aborted before start");
      }
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        return createToolError(
          ToolErrorCode.INVALID_ARGUMENTS,
          parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
        );
      }
      return handler(parsed.data);
    },
  };
}

const CustomerArgs = z.object({ customer_id: z.string().min(1) });

const LoginArgs = z.object({
  customer_id: z.string().min(1),
  days: z.coerce.number().int().positive().default(30),
});

const TransactionSearchArgs = z.object({
  account_id: z.string().min(1),
  transaction_type: z.string().nullish(),
  status: z.string().nullish(),
  days: z.coerce.number().int().positive().default(90),
  year: z.coerce.number().int().nullish(),
});

const TransactionArgs = z.object({ transaction_id: z.string().min(1) });

const PolicySearchArgs = z.object({
  query: z.string().min(1),
  category: z.string().nullish(),
  top_k: z.coerce.number().int().positive().default(3),
});

const SimilarCasesArgs = z.object({
  issue_description: z.string().min(1),
  top_k: z.coerce.number().int().positive().default(3),
});

/**
 * Build one collaborator per declared tool over the dataset
 */
export function createDatasetTools(
  dataset: CaseDataset,
  now: () => number = Date.now,
): Map<string, ToolCollaborator> {
  const referenceTime = (): number => (dataset.as_of ? Date.parse(dataset.as_of) : now());

  const tools = new Map<string, ToolCollaborator>();

  tools.set(
    "customer_lookup",
    collaborator(CustomerArgs, ({ customer_id }) => {
      const customer = dataset.customers.find((c) => c.customer_id === customer_id);
      if (!customer) {
        return createToolError(ToolErrorCode.NOT_FOUND, `Customer '${customer_id}' not found.`);
      }
      return { ...customer };
    }),
  );

  tools.set(
    "account_lookup",
    collaborator(CustomerArgs, ({ customer_id }) => {
      const accounts = dataset.accounts
        .filter((a) => a.customer_id === customer_id)
        .sort((a, b) => a.account_type.localeCompare(b.account_type))
        .map(({ customer_id: _owner, ...account }) => account);
      return { accounts, count: accounts.length };
    }),
  );

  tools.set(
    "account_login_history",
    collaborator(LoginArgs, ({ customer_id, days }) => {
      const periodDays = Math.min(days, 90);
      const since = referenceTime() - periodDays * DAY_MS;
      const events = dataset.login_events
        .filter((e) => e.customer_id === customer_id && Date.parse(e.occurred_at) > since)
        .sort(byNewest((e) => e.occurred_at))
        .slice(0, 50)
        .map(({ customer_id: _owner, ...event }) => event);

      const countries = new Set<string>();
      const devices = new Set<string>();
      for (const event of events) {
        if (event.ip_country) countries.add(event.ip_country);
        if (event.device_id) devices.add(event.device_id);
      }

      return {
        login_events: events,
        count: events.length,
        unique_countries: [...countries].sort(),
        unique_devices: [...devices].sort(),
        period_days: periodDays,
      };
    }),
  );

  tools.set(
    "account_communication_history",
    collaborator(CustomerArgs, ({ customer_id }) => {
      const communications = dataset.communications
        .filter((c) => c.customer_id === customer_id)
        .sort(byNewest((c) => c.sent_at))
        .slice(0, 20)
        .map(({ customer_id: _owner, ...communication }) => communication);
      return { communications, count: communications.length };
    }),
  );

  tools.set(
    "transactions_search",
    collaborator(TransactionSearchArgs, ({ account_id, transaction_type, status, days, year }) => {
      const windowDays = Math.min(days, 365);
      const since = referenceTime() - windowDays * DAY_MS;
      const inWindow = (initiatedAt: string): boolean =>
        year
          ? new Date(initiatedAt).getUTCFullYear() === year
          : Date.parse(initiatedAt) > since;

      const transactions = dataset.transactions
        .filter((t) => t.account_id === account_id && inWindow(t.initiated_at))
        .filter((t) => !transaction_type || t.transaction_type === transaction_type)
        .filter((t) => !status || t.status === status)
        .sort(byNewest((t) => t.initiated_at))
        .slice(0, 100)
        .map(({ account_id: _account, metadata: _metadata, ...transaction }) => transaction);

      return {
        transactions,
        count: transactions.length,
        filters: {
          transaction_type: transaction_type ?? null,
          status: status ?? null,
          days: year ? null : windowDays,
          year: year ?? null,
        },
      };
    }),
  );

  tools.set(
    "transactions_metadata",
    collaborator(TransactionArgs, ({ transaction_id }) => {
      const transaction = dataset.transactions.find((t) => t.transaction_id === transaction_id);
      if (!transaction) {
        return createToolError(
          ToolErrorCode.NOT_FOUND,
          `Transaction '${transaction_id}' not found.`,
        );
      }
      return { ...transaction };
    }),
  );

  tools.set(
    "policy_search",
    collaborator(PolicySearchArgs, ({ query, category, top_k }) => {
      const queryTokens = tokenize(query);
      const chunks = dataset.policies
        .filter((p) => !category || p.category.toUpperCase() === category.toUpperCase())
        .map((p) => ({
          content: p.content,
          source_file: p.source_file,
          category: p.category,
          section: p.section,
          relevance_score: overlapScore(queryTokens, `${p.section} ${p.content}`),
        }))
        .filter((chunk) => chunk.relevance_score > 0)
        .sort((a, b) => b.relevance_score - a.relevance_score)
        .slice(0, Math.min(top_k, 5));
      return { policy_chunks: chunks, count: chunks.length, query };
    }),
  );

  tools.set(
    "cases_similar",
    collaborator(SimilarCasesArgs, ({ issue_description, top_k }) => {
      const queryTokens = tokenize(issue_description);
      const similar = dataset.cases
        .map((c) => ({
          content: c.content,
          issue_type: c.issue_type,
          resolution_type: c.resolution_type,
          confidence_score: c.confidence_score,
          similarity: overlapScore(queryTokens, c.content),
        }))
        .filter((c) => c.similarity > 0)
        .sort((a, b) => b.similarity - a.similarity)
        .slice(0, Math.min(top_k, 5));
      return { similar_cases: similar, count: similar.length };
    }),
  );

  return tools;
}
