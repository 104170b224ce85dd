import type { ITrackerClient, NewIssue } from '../tracker';
import { TrackerError } from '../tracker.errors';
import type { Logger } from '../../logger';

export type BugzillaTrackerOptions = {
  /** Base URL of the Bugzilla instance */
  url: string;
  /** Sent as X-BUGZILLA-API-KEY; required for writes */
  apiKey?: string;
  logger: Logger;
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * BugzillaTracker - ITrackerClient over the Bugzilla REST API.
 *
 * Issue references are bug ids rendered as strings.
 */
export class BugzillaTracker implements ITrackerClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly logger: Logger;
  private readonly fetchFn: typeof fetch;

  constructor(options: BugzillaTrackerOptions) {
    this.baseUrl = options.url.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.logger = options.logger;
    this.fetchFn = options.fetch ?? fetch;
  }

  async create(issue: NewIssue): Promise<string> {
    const data = await this.request('POST', '/rest/bug', {
      product: issue.product,
      component: issue.component,
      summary: issue.summary,
      version: 'unspecified',
      description: issue.body,
    });
    if (!isRecord(data) || typeof data['id'] !== 'number') {
      throw new TrackerError('Bugzilla did not return a bug id');
    }
    const issueRef = String(data['id']);
    this.logger.info(`Filed bug ${issueRef}: ${issue.summary}`);
    return issueRef;
  }

  async comment(issueRef: string, text: string): Promise<void> {
    await this.request('POST', `/rest/bug/${encodeURIComponent(issueRef)}/comment`, { comment: text });
  }

  async setRouting(issueRef: string, primary: string, secondary: string): Promise<void> {
    await this.request('PUT', `/rest/bug/${encodeURIComponent(issueRef)}`, {
      product: primary,
      component: secondary,
    });
    this.logger.info(`Moved bug ${issueRef} to ${primary} :: ${secondary}`);
  }

  private async request(method: 'POST' | 'PUT', route: string, body: Record<string, unknown>): Promise<unknown> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.apiKey) {
      headers['X-BUGZILLA-API-KEY'] = this.apiKey;
    }

    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}${route}`, {
        method,
        headers,
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw new TrackerError(
        `Bugzilla request ${method} ${route} failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const data: unknown = await response.json().catch(() => null);
    if (!response.ok || (isRecord(data) && data['error'] === true)) {
      const detail = isRecord(data) && typeof data['message'] === 'string'
        ? data['message']
        : response.statusText;
      throw new TrackerError(`Bugzilla API error: ${response.status} ${detail}`, response.status);
    }
    return data;
  }
}
