import { BugzillaTracker } from './bugzilla_tracker';
import { TrackerError } from '../tracker.errors';
import { createLogger } from '../../logger';

const json = (body: unknown, status: number = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('BugzillaTracker', () => {
  let fetchMock: jest.Mock<ReturnType<typeof fetch>, Parameters<typeof fetch>>;
  let tracker: BugzillaTracker;

  beforeEach(() => {
    fetchMock = jest.fn<ReturnType<typeof fetch>, Parameters<typeof fetch>>();
    tracker = new BugzillaTracker({
      url: 'https://bugzilla.example.test/',
      apiKey: 'test-secret',
      logger: createLogger('[Test] '),
      fetch: fetchMock,
    });
  });

  it('should file a bug and return its id as the reference', async () => {
    fetchMock.mockResolvedValue(json({ id: 1402 }));

    const issueRef = await tracker.create({
      summary: '[wpt-sync] PR 9 - Test PR',
      body: 'blah blah body',
      product: 'Testing',
      component: 'web-platform-tests',
    });

    expect(issueRef).toBe('1402');
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://bugzilla.example.test/rest/bug');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Accept: 'application/json',
      'X-BUGZILLA-API-KEY': 'test-secret',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      product: 'Testing',
      component: 'web-platform-tests',
      summary: '[wpt-sync] PR 9 - Test PR',
      version: 'unspecified',
      description: 'blah blah body',
    });
  });

  it('should post comments to the bug', async () => {
    fetchMock.mockResolvedValue(json({ id: 77 }));

    await tracker.comment('1402', 'Downstreaming failed');

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://bugzilla.example.test/rest/bug/1402/comment');
    expect(JSON.parse(String(init?.body))).toEqual({ comment: 'Downstreaming failed' });
  });

  it('should update product and component when routing', async () => {
    fetchMock.mockResolvedValue(json({ bugs: [] }));

    await tracker.setRouting('1402', 'Core', 'DOM');

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://bugzilla.example.test/rest/bug/1402');
    expect(init?.method).toBe('PUT');
    expect(JSON.parse(String(init?.body))).toEqual({ product: 'Core', component: 'DOM' });
  });

  it('should raise TrackerError with the Bugzilla message on an error status', async () => {
    fetchMock.mockResolvedValue(json({ error: true, message: 'Component is not valid', code: 51 }, 400));

    await expect(tracker.setRouting('1402', 'Core', 'Nope'))
      .rejects.toThrow(new TrackerError('Bugzilla API error: 400 Component is not valid'));
  });

  it('should raise TrackerError when the request cannot be sent', async () => {
    fetchMock.mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));

    await expect(tracker.comment('1', 'x'))
      .rejects.toThrow('Bugzilla request POST /rest/bug/1/comment failed: getaddrinfo ENOTFOUND');
  });

  it('should reject a create response without an id', async () => {
    fetchMock.mockResolvedValue(json({}));

    await expect(tracker.create({ summary: 's', body: 'b', product: 'p', component: 'c' }))
      .rejects.toBeInstanceOf(TrackerError);
  });

  it('should omit the API key header when none is configured', async () => {
    const anonymous = new BugzillaTracker({
      url: 'https://bugzilla.example.test',
      logger: createLogger(),
      fetch: fetchMock,
    });
    fetchMock.mockResolvedValue(json({ id: 1 }));

    await anonymous.comment('1', 'x');

    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      'Content-Type': 'application/json',
      Accept: 'application/json',
    });
  });
});
