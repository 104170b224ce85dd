export type { ChangeRequestEvent, StatusEvent, KnownStatusState } from './events.types';
export { parseChangeRequestEvent, parseStatusEvent } from './event_parser';
