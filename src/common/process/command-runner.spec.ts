import {
  CommandAbortedError,
  CommandFailedError,
  runCommand,
  runCommandOrThrow,
} from './command-runner';

const node = process.execPath;

describe('runCommand', () => {
  it('captures stdout, stderr and the exit code', async () => {
    const result = await runCommand(node, [
      '-e',
      'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)',
    ]);

    expect(result).toEqual({ stdout: 'out', stderr: 'err', exitCode: 3 });
  });

  it('rejects when the binary cannot be started', async () => {
    await expect(
      runCommand('/nonexistent/office-convert-test-bin', []),
    ).rejects.toBeInstanceOf(CommandFailedError);
  });

  it('kills the process on timeout', async () => {
    const run = runCommand(node, ['-e', 'setTimeout(() => {}, 10000)'], {
      timeout: 100,
    });

    await expect(run).rejects.toThrow(/timed out after 100ms/);
  });

  it('rejects with CommandAbortedError when the signal aborts', async () => {
    const controller = new AbortController();
    const run = runCommand(node, ['-e', 'setTimeout(() => {}, 10000)'], {
      signal: controller.signal,
    });

    setTimeout(() => controller.abort(), 50);

    await expect(run).rejects.toBeInstanceOf(CommandAbortedError);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      runCommand(node, ['-e', ''], { signal: controller.signal }),
    ).rejects.toBeInstanceOf(CommandAbortedError);
  });
});

describe('runCommandOrThrow', () => {
  it('throws CommandFailedError with the exit code on failure', async () => {
    const run = runCommandOrThrow(node, [
      '-e',
      'process.stderr.write("bad input"); process.exit(2)',
    ]);

    await expect(run).rejects.toMatchObject({
      name: 'CommandFailedError',
      exitCode: 2,
      stderr: 'bad input',
    });
  });

  it('resolves on a zero exit code', async () => {
    const result = await runCommandOrThrow(node, ['-e', 'console.log("ok")']);
    expect(result.stdout).toBe('ok\n');
  });
});
