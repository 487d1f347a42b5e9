import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { EventEmitter } from 'events';

class MockChildProcess extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  killed = false;

  kill(signal?: string) {
    this.killed = true;
    this.emit('close', signal === 'SIGKILL' ? -9 : -15);
  }
}

const mockSpawn = jest.fn();

jest.mock('child_process', () => ({
  spawn: (...args: unknown[]) => mockSpawn(...args),
}));

import { executeCommand, which } from '../../../src/host/command.js';
import { NodeWorktree } from '../../../src/host/node-host.js';

const finder = process.platform === 'win32' ? 'where' : 'which';

describe('command helpers', () => {
  let mockProcess: MockChildProcess;

  beforeEach(() => {
    mockProcess = new MockChildProcess();
    mockSpawn.mockReturnValue(mockProcess);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('executeCommand', () => {
    it('should resolve with trimmed stdout', async () => {
      const promise = executeCommand(['echo', 'test'], { cwd: '/work' });

      setImmediate(() => {
        mockProcess.stdout.emit('data', Buffer.from('test output\n'));
        mockProcess.emit('close', 0);
      });

      await expect(promise).resolves.toBe('test output');
      expect(mockSpawn).toHaveBeenCalledWith('echo', ['test'], {
        cwd: '/work',
        env: process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false,
      });
    });

    it('should reject with stderr on a non-zero exit', async () => {
      const promise = executeCommand(['false']);

      setImmediate(() => {
        mockProcess.stderr.emit('data', Buffer.from('error message\n'));
        mockProcess.emit('close', 1);
      });

      await expect(promise).rejects.toThrow('false failed: error message');
    });

    it('should report the exit code when stderr is empty', async () => {
      const promise = executeCommand(['grep', 'nothing']);

      setImmediate(() => mockProcess.emit('close', 2));

      await expect(promise).rejects.toThrow('grep failed: Command failed with code 2');
    });

    it('should reject an empty command array', async () => {
      await expect(executeCommand([])).rejects.toThrow('Command array is empty');
      expect(mockSpawn).not.toHaveBeenCalled();
    });

    it('should reject when spawn throws', async () => {
      mockSpawn.mockImplementation(() => {
        throw new Error('spawn failed');
      });

      await expect(executeCommand(['missing'])).rejects.toThrow(
        'Failed to spawn missing: spawn failed'
      );
    });

    it('should reject on a process error event', async () => {
      const promise = executeCommand(['missing']);

      setImmediate(() => mockProcess.emit('error', new Error('spawn missing ENOENT')));

      await expect(promise).rejects.toThrow('Failed to execute missing: spawn missing ENOENT');
    });

    it('should kill the process after the timeout', async () => {
      jest.useFakeTimers();

      const promise = executeCommand(['sleep', '10'], { timeout: 100 });
      jest.advanceTimersByTime(100);

      await expect(promise).rejects.toThrow('Command timed out after 100ms: sleep 10');
      expect(mockProcess.killed).toBe(true);
    });
  });

  describe('which', () => {
    it('should return the first match', async () => {
      const promise = which('cambridge-lsp');

      setImmediate(() => {
        mockProcess.stdout.emit(
          'data',
          Buffer.from('/usr/local/bin/cambridge-lsp\r\n/usr/bin/cambridge-lsp\r\n')
        );
        mockProcess.emit('close', 0);
      });

      await expect(promise).resolves.toBe('/usr/local/bin/cambridge-lsp');
      expect(mockSpawn).toHaveBeenCalledWith(finder, ['cambridge-lsp'], expect.anything());
    });

    it('should return undefined when the command is not found', async () => {
      const promise = which('cambridge-lsp');

      setImmediate(() => mockProcess.emit('close', 1));

      await expect(promise).resolves.toBeUndefined();
    });

    it('should return undefined for empty output', async () => {
      const promise = which('cambridge-lsp');

      setImmediate(() => mockProcess.emit('close', 0));

      await expect(promise).resolves.toBeUndefined();
    });
  });

  describe('NodeWorktree', () => {
    it('should search from the worktree root', async () => {
      const worktree = new NodeWorktree('/project');
      const promise = worktree.which('cambridge-lsp');

      setImmediate(() => {
        mockProcess.stdout.emit('data', Buffer.from('/home/dev/go/bin/cambridge-lsp\n'));
        mockProcess.emit('close', 0);
      });

      await expect(promise).resolves.toBe('/home/dev/go/bin/cambridge-lsp');
      expect(mockSpawn).toHaveBeenCalledWith(
        finder,
        ['cambridge-lsp'],
        expect.objectContaining({ cwd: '/project' })
      );
    });
  });
});
