/**
 * ITrackerClient - the bug tracker a sync reports to
 *
 * @module tracker
 */

export type NewIssue = {
  summary: string;
  /** First comment of the issue */
  body: string;
  product: string;
  component: string;
};

export interface ITrackerClient {
  /** Files an issue and returns its reference */
  create(issue: NewIssue): Promise<string>;
  comment(issueRef: string, text: string): Promise<void>;
  /** Moves the issue to `primary :: secondary` (product and component) */
  setRouting(issueRef: string, primary: string, secondary: string): Promise<void>;
}
