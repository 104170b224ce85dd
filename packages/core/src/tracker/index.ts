export type { ITrackerClient, NewIssue } from './tracker';
export { TrackerError } from './tracker.errors';
