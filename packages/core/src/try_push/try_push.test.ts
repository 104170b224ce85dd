import { TryPushError, constructTryMessage, parseAffectedTests, pushToTry } from './try_push';
import { MemoryGitModule } from '../git/memory';
import { createLogger } from '../logger';

const RESULTS = 'https://treeherder.example.test/#/jobs?repo=try&revision=';
const REVISION = '0123456789abcdef0123456789abcdef01234567';

describe('parseAffectedTests', () => {
  it('should group paths by test type', () => {
    const output = 'dom/a.html\ttestharness\ncss/b.html\treftest\ndom/c.html\ttestharness\n';

    expect([...parseAffectedTests(output)]).toEqual([
      ['testharness', ['dom/a.html', 'dom/c.html']],
      ['reftest', ['css/b.html']],
    ]);
  });

  it('should return no tests for empty output', () => {
    expect(parseAffectedTests('\n').size).toBe(0);
  });

  it('should reject lines without exactly two fields', () => {
    expect(() => parseAffectedTests('dom/a.html\n')).toThrow(TryPushError);
    expect(() => parseAffectedTests('a\tb\tc\n')).toThrow('Malformed affected-test line: "a\tb\tc"');
  });
});

describe('constructTryMessage', () => {
  it('should add platform-qualified jobs for testharness only', () => {
    const message = constructTryMessage(new Map([
      ['testharness', ['dom/a.html']],
      ['wdspec', ['webdriver/x.py']],
    ]));

    expect(message).toBe(
      'try: -b do -p win32,win64,linux64,linux -u '
      + 'web-platform-tests[linux64-stylo,Ubuntu,10.10,Windows 7,Windows 8,Windows 10],'
      + 'web-platform-tests-e10s[linux64-stylo,Ubuntu,10.10,Windows 7,Windows 8,Windows 10],'
      + 'web-platform-tests-wdspec,web-platform-tests-wdspec-e10s '
      + '-t none --artifact --try-test-paths web-platform-tests:dom/a.html,web-platform-tests-wdspec:webdriver/x.py'
    );
  });

  it('should skip unknown test types', () => {
    const message = constructTryMessage(new Map([
      ['manual', ['x.html']],
      ['reftest', ['css/b.html']],
    ]));

    expect(message).toBe(
      'try: -b do -p win32,win64,linux64,linux -u web-platform-tests-reftests,web-platform-tests-reftests-e10s '
      + '-t none --artifact --try-test-paths web-platform-tests-reftests:css/b.html'
    );
  });
});

describe('pushToTry', () => {
  let git: MemoryGitModule;
  const logger = createLogger('[Test] ');

  beforeEach(() => {
    git = new MemoryGitModule('/work/gecko/PR_9');
    git.setRef('PR_9', ['c1', 'c2']);
  });

  it('should push an empty trigger commit and take it off again', async () => {
    git.setPushOutput({ stdout: '', stderr: `remote: View your changes: revision=${REVISION}\n` });

    const result = await pushToTry(git, 'PR_9', 'try: -b do', { remote: 'try', resultsUrl: RESULTS, logger });

    expect(result).toEqual({ revision: REVISION, resultsUrl: `${RESULTS}${REVISION}` });
    expect(git.getCalls()).toEqual([
      '/work/gecko/PR_9: checkout PR_9',
      '/work/gecko/PR_9: commit --allow-empty try: -b do',
      '/work/gecko/PR_9: push try',
      '/work/gecko/PR_9: reset HEAD~',
    ]);
    expect(git.getHistory('PR_9')).toEqual(['c1', 'c2']);
  });

  it('should undo the trigger commit when the push reports no revision', async () => {
    git.setPushOutput({ stdout: 'Everything up-to-date', stderr: '' });

    await expect(pushToTry(git, 'PR_9', 'try: -b do', { remote: 'try', resultsUrl: RESULTS, logger }))
      .rejects.toThrow('Push to try did not report a revision');
    expect(git.getHistory('PR_9')).toEqual(['c1', 'c2']);
  });

  it('should undo the trigger commit when the push fails', async () => {
    git.failOn('push');

    await expect(pushToTry(git, 'PR_9', 'try: -b do', { remote: 'try', resultsUrl: RESULTS, logger }))
      .rejects.toThrow('push failed');
    expect(git.getHistory('PR_9')).toEqual(['c1', 'c2']);
  });
});
