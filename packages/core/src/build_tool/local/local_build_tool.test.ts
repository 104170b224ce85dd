import { LocalBuildTool } from './local_build_tool';
import { BuildToolError, BuildToolTimeoutError } from '../build_tool.errors';
import { createLogger } from '../../logger';
import type { ExecCommand, ExecResult } from '../../git/types';

const ok = (stdout: string = ''): ExecResult => ({ exitCode: 0, stdout, stderr: '' });

describe('LocalBuildTool', () => {
  let execCommand: jest.Mock<ReturnType<ExecCommand>, Parameters<ExecCommand>>;
  let tool: LocalBuildTool;

  beforeEach(() => {
    execCommand = jest.fn<ReturnType<ExecCommand>, Parameters<ExecCommand>>();
    tool = new LocalBuildTool({ execCommand, logger: createLogger('[Test] '), timeoutMs: 5000 });
  });

  it('should regenerate the manifest with mach in the target tree', async () => {
    execCommand.mockResolvedValue(ok());

    await tool.regenerateMetadata('/work/gecko/PR_9');

    expect(execCommand).toHaveBeenCalledWith('./mach', ['wpt-manifest-update'], {
      cwd: '/work/gecko/PR_9',
      timeout: 5000,
    });
  });

  it('should return the distinct non-empty changed paths', async () => {
    execCommand.mockResolvedValue(ok('dom/a.html\ndom/b.html\n\ndom/a.html\n'));

    const paths = await tool.filesChanged('/work/wpt/PR_9');

    expect(paths).toEqual(['dom/a.html', 'dom/b.html']);
    expect(execCommand).toHaveBeenCalledWith('./wpt', ['files-changed'], expect.objectContaining({ cwd: '/work/wpt/PR_9' }));
  });

  it('should pass every path to the classification query', async () => {
    execCommand.mockResolvedValue(ok('Core :: DOM\n  testing/web-platform/tests/dom/a.html\n'));

    const report = await tool.classifyPaths('/g', ['testing/web-platform/tests/dom/a.html']);

    expect(report).toBe('Core :: DOM\n  testing/web-platform/tests/dom/a.html\n');
    expect(execCommand).toHaveBeenCalledWith(
      './mach',
      ['file-info', 'bugzilla-component', 'testing/web-platform/tests/dom/a.html'],
      expect.anything(),
    );
  });

  it('should update the manifest before listing affected tests', async () => {
    execCommand.mockResolvedValueOnce(ok()).mockResolvedValueOnce(ok('dom/a.html\ttestharness\n'));

    const output = await tool.testsAffected('/w', 'origin/master');

    expect(output).toBe('dom/a.html\ttestharness\n');
    expect(execCommand.mock.calls.map(([command, args]) => [command, ...args].join(' '))).toEqual([
      './wpt manifest',
      './wpt tests-affected --show-type --new origin/master',
    ]);
  });

  it('should raise BuildToolError with stderr on a non-zero exit', async () => {
    execCommand.mockResolvedValue({ exitCode: 2, stdout: '', stderr: 'mach: not configured\n' });

    const error = await tool.regenerateMetadata('/g').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BuildToolError);
    expect(error instanceof BuildToolError && error.diagnostic).toBe(
      './mach wpt-manifest-update exited with code 2\nmach: not configured'
    );
  });

  it('should raise BuildToolTimeoutError when the command times out', async () => {
    execCommand.mockResolvedValue({ exitCode: 124, stdout: '', stderr: '', timedOut: true });

    await expect(tool.filesChanged('/w')).rejects.toBeInstanceOf(BuildToolTimeoutError);
  });

  it('should not pass a timeout when none is configured', async () => {
    const untimed = new LocalBuildTool({ execCommand, logger: createLogger() });
    execCommand.mockResolvedValue(ok());

    await untimed.regenerateMetadata('/g');

    expect(execCommand).toHaveBeenCalledWith('./mach', ['wpt-manifest-update'], { cwd: '/g' });
  });
});
