import { validateSchema } from '../validation';
import type { ChangeRequestEvent, StatusEvent } from './events.types';

/**
 * Validates a change-request notification and keeps only the fields the
 * engine uses.
 *
 * @throws SchemaValidationError
 */
export function parseChangeRequestEvent(data: unknown): ChangeRequestEvent {
  const event = validateSchema<ChangeRequestEvent>('change_request_event', data);
  return {
    changeRequestId: event.changeRequestId,
    title: event.title,
    body: event.body,
  };
}

/**
 * Validates a CI status notification. Unknown states pass validation; the
 * reactor decides to ignore them.
 *
 * @throws SchemaValidationError
 */
export function parseStatusEvent(data: unknown): StatusEvent {
  const event = validateSchema<StatusEvent>('status_event', data);
  return {
    context: event.context,
    state: event.state,
    sha: event.sha,
  };
}
