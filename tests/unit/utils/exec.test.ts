import { EventEmitter } from 'node:events';
import { afterEach, describe, expect, it, vi } from 'vitest';

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

const { execFileMock, spawnMock } = vi.hoisted(() => ({
  execFileMock: vi.fn(),
  spawnMock: vi.fn(),
}));

vi.mock('node:child_process', () => ({
  execFile: execFileMock,
  spawn: spawnMock,
}));

import { runCommand, spawnBackground, spawnLines } from '../../../src/utils/exec.js';

function respond(error: Error | null, stdout = '', stderr = ''): void {
  execFileMock.mockImplementation(
    (_file: string, _args: string[], _options: object, callback: ExecCallback) => {
      callback(error, stdout, stderr);
    },
  );
}

describe('runCommand', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should resolve with the output of a successful command', async () => {
    respond(null, 'tart 2.0.0\n');

    await expect(runCommand('tart', ['--version'])).resolves.toEqual({
      exitCode: 0,
      stdout: 'tart 2.0.0\n',
      stderr: '',
      timedOut: false,
    });
  });

  it('should pass the timeout through to execFile', async () => {
    respond(null);

    await runCommand('tart', ['list'], { timeoutMs: 5000 });

    expect(execFileMock).toHaveBeenCalledWith(
      'tart',
      ['list'],
      expect.objectContaining({ timeout: 5000, encoding: 'utf-8' }),
      expect.any(Function),
    );
  });

  it('should report a non-zero exit instead of rejecting', async () => {
    respond(Object.assign(new Error('Command failed'), { code: 2 }), '', 'no such VM\n');

    await expect(runCommand('tart', ['delete', 'missing'])).resolves.toEqual({
      exitCode: 2,
      stdout: '',
      stderr: 'no such VM\n',
      timedOut: false,
    });
  });

  it('should flag a command killed by the timeout', async () => {
    respond(Object.assign(new Error('Command failed'), { code: null, killed: true, signal: 'SIGTERM' }));

    const result = await runCommand('tart', ['clone', 'base', 'copy'], { timeoutMs: 10 });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(1);
  });

  it('should reject when the binary cannot be spawned', async () => {
    respond(Object.assign(new Error('spawn tart ENOENT'), { code: 'ENOENT' }));

    await expect(runCommand('tart', ['list'])).rejects.toThrow('spawn tart ENOENT');
  });
});

describe('spawnBackground', () => {
  it('should detach output from the parent', () => {
    spawnBackground('tart', ['run', 'vm', '--no-graphics']);

    expect(spawnMock).toHaveBeenCalledWith('tart', ['run', 'vm', '--no-graphics'], { stdio: 'ignore' });
  });
});

describe('spawnLines', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should deliver complete lines from both streams', () => {
    const child = { stdout: new EventEmitter(), stderr: new EventEmitter() };
    spawnMock.mockReturnValue(child);
    const lines: string[] = [];

    spawnLines('ssh', ['admin@192.168.64.5', 'tail -F runner.log'], (line, stream) => {
      lines.push(`${stream}: ${line}`);
    });
    child.stdout.emit('data', Buffer.from('Listening for Jobs\nRunning job: bu'));
    child.stdout.emit('data', 'ild\r\n\n');
    child.stderr.emit('data', 'Warning: Permanently added host\n');
    child.stdout.emit('data', 'Job build completed');
    child.stdout.emit('end');

    expect(spawnMock).toHaveBeenCalledWith('ssh', ['admin@192.168.64.5', 'tail -F runner.log'], {
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    expect(lines).toEqual([
      'stdout: Listening for Jobs',
      'stdout: Running job: build',
      'stderr: Warning: Permanently added host',
      'stdout: Job build completed',
    ]);
  });
});
