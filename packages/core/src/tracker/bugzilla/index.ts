export { BugzillaTracker } from './bugzilla_tracker';
export type { BugzillaTrackerOptions } from './bugzilla_tracker';
