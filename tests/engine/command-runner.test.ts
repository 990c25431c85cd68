import { ShellCommandRunner } from '../../src/engine/command-runner';

describe('ShellCommandRunner', () => {
  const runner = new ShellCommandRunner();

  test('resolves when the command exits 0', async () => {
    await expect(runner.run('exit 0')).resolves.toBeUndefined();
  });

  test('rejects with the exit code and stderr tail', async () => {
    await expect(runner.run('echo oops >&2; exit 3')).rejects.toMatchObject({
      code: 'ROLLBACK.COMMAND_FAILED',
      message: 'Command exited with code 3: oops',
      typedError: { details: { command: 'echo oops >&2; exit 3', exitCode: 3 } },
    });
  });

  test('rejects without stderr when the command is silent', async () => {
    await expect(runner.run('exit 7')).rejects.toMatchObject({ message: 'Command exited with code 7' });
  });

  test('kills a command that outlives its timeout', async () => {
    const impatient = new ShellCommandRunner({ timeoutMs: 50 });
    await expect(impatient.run('sleep 5')).rejects.toMatchObject({ message: 'Command timed out after 50ms' });
  });

  test('the timeout holds when the shell is not the last process running', async () => {
    const impatient = new ShellCommandRunner({ timeoutMs: 100 });
    const started = Date.now();

    await expect(impatient.run('sleep 3; true')).rejects.toMatchObject({ message: 'Command timed out after 100ms' });

    expect(Date.now() - started).toBeLessThan(1500);
  });

  test('reports a shell that cannot be started', async () => {
    const broken = new ShellCommandRunner({ shell: '/nonexistent/shell' });
    await expect(broken.run('true')).rejects.toMatchObject({
      code: 'ROLLBACK.COMMAND_FAILED',
      message: expect.stringMatching(/^Cannot start \/nonexistent\/shell: /),
    });
  });
});
