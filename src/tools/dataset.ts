/**
 * Case dataset - the records behind the tool collaborators and the issue source
 */

import fs from "node:fs/promises";
import { z } from "zod";
import { IssueChannelSchema, IssueStatusSchema, IssueUrgencySchema, type Issue } from "../issues/types.js";

const CustomerSchema = z.object({
  customer_id: z.string(),
  name: z.string(),
  email: z.string(),
  province: z.string(),
  kyc_status: z.enum(["verified", "pending", "flagged", "expired"]),
  kyc_verified_at: z.string().nullable().default(null),
  kyc_expires_at: z.string().nullable().default(null),
  risk_profile: z.string().default("balanced"),
});

const AccountSchema = z.object({
  account_id: z.string(),
  customer_id: z.string(),
  account_type: z.string(),
  status: z.enum(["active", "frozen", "restricted", "closed"]),
  freeze_reason: z.string().nullable().default(null),
  balance: z.number(),
  available_balance: z.number(),
  currency: z.string().default("CAD"),
  rrsp_contribution_ytd: z.number().default(0),
  tfsa_contribution_ytd: z.number().default(0),
});

const TransactionSchema = z.object({
  transaction_id: z.string(),
  account_id: z.string(),
  transaction_type: z.string(),
  amount: z.number(),
  currency: z.string().default("CAD"),
  status: z.string(),
  description: z.string().nullable().default(null),
  counterparty: z.string().nullable().default(null),
  reference_number: z.string().nullable().default(null),
  failure_reason: z.string().nullable().default(null),
  initiated_at: z.string(),
  settled_at: z.string().nullable().default(null),
  metadata: z.record(z.unknown()).default({}),
});

const LoginEventSchema = z.object({
  event_id: z.string(),
  customer_id: z.string(),
  event_type: z.enum(["login", "logout", "failed_attempt"]),
  device_id: z.string().nullable().default(null),
  ip_address: z.string().nullable().default(null),
  ip_country: z.string().nullable().default(null),
  occurred_at: z.string(),
});

const CommunicationSchema = z.object({
  comm_id: z.string(),
  customer_id: z.string(),
  channel: z.string(),
  subject: z.string(),
  body_summary: z.string(),
  sent_at: z.string(),
});

const PolicyChunkSchema = z.object({
  policy_id: z.string(),
  category: z.string(),
  section: z.string(),
  source_file: z.string(),
  content: z.string(),
});

const HistoricalCaseSchema = z.object({
  case_id: z.string(),
  issue_type: z.string(),
  content: z.string(),
  resolution_type: z.string(),
  confidence_score: z.number(),
});

const DatasetIssueSchema = z.object({
  issue_id: z.string(),
  customer_id: z.string(),
  channel: IssueChannelSchema,
  urgency: IssueUrgencySchema,
  raw_message: z.string(),
  status: IssueStatusSchema.default("open"),
  created_at: z.string().optional(),
});

export const CaseDatasetSchema = z.object({
  /** Reference time for day windows; the current time when absent */
  as_of: z.string().optional(),
  customers: z.array(CustomerSchema).default([]),
  accounts: z.array(AccountSchema).default([]),
  transactions: z.array(TransactionSchema).default([]),
  login_events: z.array(LoginEventSchema).default([]),
  communications: z.array(CommunicationSchema).default([]),
  policies: z.array(PolicyChunkSchema).default([]),
  cases: z.array(HistoricalCaseSchema).default([]),
  issues: z.array(DatasetIssueSchema).default([]),
});

export type CaseDataset = z.infer<typeof CaseDatasetSchema>;
export type Customer = z.infer<typeof CustomerSchema>;
export type Account = z.infer<typeof AccountSchema>;
export type Transaction = z.infer<typeof TransactionSchema>;

/**
 * Load and validate a dataset file
 */
export async function loadDataset(filePath: string): Promise<CaseDataset> {
  const content = await fs.readFile(filePath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  const result = CaseDatasetSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid dataset ${filePath}: ${issues.join("; ")}`);
  }
  return result.data;
}

/**
 * Issues of a dataset in the investigator's shape
 */
export function datasetIssues(dataset: CaseDataset): Issue[] {
  return dataset.issues.map((issue) => ({
    issueId: issue.issue_id,
    customerId: issue.customer_id,
    rawMessage: issue.raw_message,
    channel: issue.channel,
    urgency: issue.urgency,
    status: issue.status,
    ...(issue.created_at ? { createdAt: issue.created_at } : {}),
  }));
}
