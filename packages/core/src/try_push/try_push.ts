import type { IGitModule } from '../git';
import type { Logger } from '../logger';

/** Upstream test type to the try suite that runs it */
export const TEST_TYPE_SUITES: Readonly<Record<string, string>> = {
  testharness: 'web-platform-tests',
  reftest: 'web-platform-tests-reftests',
  wdspec: 'web-platform-tests-wdspec',
};

const PLATFORM_SUFFIX = '[linux64-stylo,Ubuntu,10.10,Windows 7,Windows 8,Windows 10]';
const REVISION_PATTERN = /revision=([0-9a-f]{40})/;

/**
 * Error thrown when affected tests cannot be read or a try push fails
 */
export class TryPushError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TryPushError';
    Object.setPrototypeOf(this, TryPushError.prototype);
  }
}

/**
 * Groups `path\ttype` lines by test type, keeping first-seen order.
 *
 * @throws TryPushError for a line that is not exactly two tab-separated fields
 */
export function parseAffectedTests(output: string): Map<string, string[]> {
  const testsByType = new Map<string, string[]>();
  const trimmed = output.trim();
  if (!trimmed) {
    return testsByType;
  }

  for (const line of trimmed.split('\n')) {
    const fields = line.trim().split('\t');
    const [testPath, testType] = fields;
    if (fields.length !== 2 || !testPath || !testType) {
      throw new TryPushError(`Malformed affected-test line: "${line}"`);
    }
    const paths = testsByType.get(testType) ?? [];
    if (!paths.includes(testPath)) {
      paths.push(testPath);
    }
    testsByType.set(testType, paths);
  }
  return testsByType;
}

/**
 * Builds the try directive running the affected tests on every platform.
 * Test types without a try suite are left out.
 */
export function constructTryMessage(testsByType: Map<string, string[]>): string {
  const jobs: string[] = [];
  const selectors: string[] = [];

  for (const [testType, paths] of testsByType) {
    const suite = TEST_TYPE_SUITES[testType];
    if (!suite) {
      continue;
    }
    if (paths.length > 0) {
      const machines = suite === 'web-platform-tests' ? PLATFORM_SUFFIX : '';
      jobs.push(`${suite}${machines}`, `${suite}-e10s${machines}`);
    }
    selectors.push(...paths.map((p) => `${suite}:${p}`));
  }

  return `try: -b do -p win32,win64,linux64,linux -u ${jobs.join(',')} `
    + `-t none --artifact --try-test-paths ${selectors.join(',')}`;
}

export type TryPushOptions = {
  /** Remote to push to */
  remote: string;
  /** Results page prefix the pushed revision is appended to */
  resultsUrl: string;
  logger: Logger;
};

export type TryPushResult = {
  revision: string;
  resultsUrl: string;
};

/**
 * Pushes `branch` to try with `message` as an empty trigger commit, which
 * is always taken off the branch again afterwards.
 *
 * @throws TryPushError when the push output names no revision
 */
export async function pushToTry(
  git: IGitModule,
  branch: string,
  message: string,
  options: TryPushOptions,
): Promise<TryPushResult> {
  await git.checkout(branch);
  await git.commit(message, { allowEmpty: true });
  try {
    const { stdout, stderr } = await git.push(options.remote);
    const revision = REVISION_PATTERN.exec(stdout)?.[1] ?? REVISION_PATTERN.exec(stderr)?.[1];
    if (!revision) {
      throw new TryPushError(`Push to ${options.remote} did not report a revision`);
    }
    options.logger.info(`Pushed ${branch} to ${options.remote} as ${revision}`);
    return { revision, resultsUrl: `${options.resultsUrl}${revision}` };
  } finally {
    await git.resetMixed('HEAD~');
  }
}
