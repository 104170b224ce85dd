import { parseChangeRequestEvent, parseStatusEvent } from './event_parser';
import { SchemaValidationError } from '../validation';

describe('parseChangeRequestEvent', () => {
  it('keeps the change request fields and drops the rest', () => {
    expect(parseChangeRequestEvent({
      changeRequestId: 9,
      title: 'Test PR',
      body: 'blah blah body',
      user: 'someone',
    })).toEqual({ changeRequestId: 9, title: 'Test PR', body: 'blah blah body' });
  });

  it('accepts an empty body', () => {
    expect(parseChangeRequestEvent({ changeRequestId: 3, title: 'x', body: '' }).body).toBe('');
  });

  it('rejects a non-integer id', () => {
    expect(() => parseChangeRequestEvent({ changeRequestId: '9', title: 'Test PR', body: '' }))
      .toThrow(SchemaValidationError);
  });

  it('rejects a missing title', () => {
    expect(() => parseChangeRequestEvent({ changeRequestId: 9, body: '' }))
      .toThrow("Invalid change_request_event: /: must have required property 'title'");
  });
});

describe('parseStatusEvent', () => {
  it('accepts states the reactor does not act on', () => {
    expect(parseStatusEvent({
      context: 'continuous-integration/travis-ci/pr',
      state: 'failure',
      sha: '409018c0a562e1b47d97b53428bb7650f763720d',
    })).toEqual({
      context: 'continuous-integration/travis-ci/pr',
      state: 'failure',
      sha: '409018c0a562e1b47d97b53428bb7650f763720d',
    });
  });

  it('rejects a sha that is not hexadecimal', () => {
    expect(() => parseStatusEvent({ context: 'ci', state: 'pending', sha: 'HEAD' }))
      .toThrow(SchemaValidationError);
  });
});
