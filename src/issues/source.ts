/**
 * In-process issue source
 */

import { NotFoundError } from "../errors.js";
import type { Issue, IssueFilter, IssueSource, IssueStatus } from "./types.js";

/**
 * Issue source over a fixed set of issues. Status transitions live in memory.
 */
export class MemoryIssueSource implements IssueSource {
  private readonly issues = new Map<string, Issue>();

  constructor(issues: Issue[] = []) {
    for (const issue of issues) {
      this.issues.set(issue.issueId, { ...issue });
    }
  }

  async get(issueId: string): Promise<Issue | undefined> {
    const issue = this.issues.get(issueId);
    return issue ? { ...issue } : undefined;
  }

  async list(filter: IssueFilter = {}): Promise<Issue[]> {
    return Array.from(this.issues.values())
      .filter((issue) => !filter.status || issue.status === filter.status)
      .filter((issue) => !filter.customerId || issue.customerId === filter.customerId)
      .map((issue) => ({ ...issue }));
  }

  async setStatus(issueId: string, status: IssueStatus): Promise<void> {
    const issue = this.issues.get(issueId);
    if (!issue) {
      throw new NotFoundError("Issue", issueId);
    }
    issue.status = status;
  }
}
