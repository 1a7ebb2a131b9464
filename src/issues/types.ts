/**
 * Issue types
 */

import { z } from "zod";

export const IssueChannelSchema = z.enum(["chat", "email", "phone_transcript"]);
export const IssueUrgencySchema = z.enum(["low", "medium", "high", "critical"]);
export const IssueStatusSchema = z.enum(["open", "investigating", "resolved", "escalated"]);

export type IssueChannel = z.infer<typeof IssueChannelSchema>;
export type IssueUrgency = z.infer<typeof IssueUrgencySchema>;
export type IssueStatus = z.infer<typeof IssueStatusSchema>;

/**
 * A customer-reported issue. Read-only to the investigator.
 */
export interface Issue {
  issueId: string;
  customerId: string;
  rawMessage: string;
  channel: IssueChannel;
  urgency: IssueUrgency;
  status: IssueStatus;
  createdAt?: string;
}

export const IssueSchema: z.ZodType<Issue, z.ZodTypeDef, unknown> = z.object({
  issueId: z.string(),
  customerId: z.string(),
  rawMessage: z.string(),
  channel: IssueChannelSchema,
  urgency: IssueUrgencySchema,
  status: IssueStatusSchema,
  createdAt: z.string().optional(),
});

export interface IssueFilter {
  status?: IssueStatus;
  customerId?: string;
}

/**
 * Where issues come from and where status transitions are recorded
 */
export interface IssueSource {
  get(issueId: string): Promise<Issue | undefined>;
  list(filter?: IssueFilter): Promise<Issue[]>;
  setStatus(issueId: string, status: IssueStatus): Promise<void>;
}
