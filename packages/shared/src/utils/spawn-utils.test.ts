import type { ChildProcess } from 'node:child_process';

import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { Readable } from 'node:stream';
import { describe, expect, test, vi } from 'vitest';

import { spawnAsync } from './spawn-utils';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

const spawnMock = vi.mocked(spawn);

function createMockProcess() {
  const stdout = new Readable({ read() {} });
  const stderr = new Readable({ read() {} });
  const emitter = new EventEmitter();
  Object.assign(emitter, { stdout, stderr });

  return {
    proc: emitter as unknown as ChildProcess,
    stdout,
    stderr,
  };
}

describe('spawnAsync', () => {
  test('collects stdout and stderr', async () => {
    const { proc, stdout, stderr } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('pdfinfo', ['/tmp/report.pdf']);

    stdout.emit('data', Buffer.from('Pages: '));
    stdout.emit('data', Buffer.from('3\n'));
    stderr.emit('data', Buffer.from('Syntax Warning'));
    proc.emit('close', 0, null);

    await expect(promise).resolves.toEqual({
      stdout: 'Pages: 3\n',
      stderr: 'Syntax Warning',
      code: 0,
      signal: null,
    });
  });

  test('passes cwd, env, abort signal and timeout to spawn', async () => {
    const { proc } = createMockProcess();
    spawnMock.mockReturnValue(proc);
    const controller = new AbortController();

    const promise = spawnAsync('pdftotext', ['-layout'], {
      cwd: '/tmp',
      env: { LANG: 'C.UTF-8' },
      abortSignal: controller.signal,
      timeoutMs: 5000,
    });
    proc.emit('close', 0, null);
    await promise;

    expect(spawnMock).toHaveBeenCalledWith('pdftotext', ['-layout'], {
      cwd: '/tmp',
      env: { LANG: 'C.UTF-8' },
      signal: controller.signal,
      timeout: 5000,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  });

  test('keeps multi-byte characters split across chunks', async () => {
    const { proc, stdout } = createMockProcess();
    spawnMock.mockReturnValue(proc);
    const bytes = Buffer.from('café', 'utf-8');

    const promise = spawnAsync('pdftotext', []);
    stdout.emit('data', bytes.subarray(0, 4));
    stdout.emit('data', bytes.subarray(4));
    proc.emit('close', 0, null);

    expect((await promise).stdout).toBe('café');
  });

  test('reports a null code for signal-terminated processes', async () => {
    const { proc } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('pdftotext', []);
    proc.emit('close', null, 'SIGTERM');

    await expect(promise).resolves.toMatchObject({
      code: null,
      signal: 'SIGTERM',
    });
  });

  test('rejects when the process cannot start', async () => {
    const { proc } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('missing-binary', []);
    proc.emit(
      'error',
      Object.assign(new Error('spawn missing-binary ENOENT'), {
        code: 'ENOENT',
      }),
    );

    await expect(promise).rejects.toThrow('spawn missing-binary ENOENT');
  });
});
