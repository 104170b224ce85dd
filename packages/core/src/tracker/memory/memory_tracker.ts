import type { ITrackerClient, NewIssue } from '../tracker';
import { TrackerError } from '../tracker.errors';

export type MemoryIssue = NewIssue & {
  comments: string[];
};

type Operation = 'create' | 'comment' | 'setRouting';

/**
 * MemoryTracker - In-memory ITrackerClient for tests
 *
 * Issues get sequential references starting at "1".
 */
export class MemoryTracker implements ITrackerClient {
  private readonly issues = new Map<string, MemoryIssue>();
  private readonly failures = new Map<Operation, Error>();
  private nextId = 1;

  // ─────────────────────────────────────────────────────────
  // Test Helpers
  // ─────────────────────────────────────────────────────────

  getIssue(issueRef: string): MemoryIssue | undefined {
    const issue = this.issues.get(issueRef);
    return issue ? { ...issue, comments: [...issue.comments] } : undefined;
  }

  listIssues(): MemoryIssue[] {
    return [...this.issues.values()].map((issue) => ({ ...issue, comments: [...issue.comments] }));
  }

  failOn(operation: Operation, error: Error = new TrackerError(`${operation} failed`)): void {
    this.failures.set(operation, error);
  }

  private check(operation: Operation): void {
    const failure = this.failures.get(operation);
    if (failure) {
      throw failure;
    }
  }

  private require(issueRef: string): MemoryIssue {
    const issue = this.issues.get(issueRef);
    if (!issue) {
      throw new TrackerError(`No such issue: ${issueRef}`, 404);
    }
    return issue;
  }

  // ─────────────────────────────────────────────────────────
  // ITrackerClient
  // ─────────────────────────────────────────────────────────

  async create(issue: NewIssue): Promise<string> {
    this.check('create');
    const issueRef = String(this.nextId++);
    this.issues.set(issueRef, { ...issue, comments: [] });
    return issueRef;
  }

  async comment(issueRef: string, text: string): Promise<void> {
    this.check('comment');
    this.require(issueRef).comments.push(text);
  }

  async setRouting(issueRef: string, primary: string, secondary: string): Promise<void> {
    this.check('setRouting');
    const issue = this.require(issueRef);
    issue.product = primary;
    issue.component = secondary;
  }
}
