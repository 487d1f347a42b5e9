import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runCli, type CliIo } from '../../src/cli.js';

describe('runCli', () => {
  let tempDir: string;
  let stdout: string[];
  let stderr: string[];

  const io = (env: NodeJS.ProcessEnv): CliIo => ({
    env,
    cwd: tempDir,
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
  });

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'cambridge-lsp-cli-'));
    stdout = [];
    stderr = [];
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should print the command descriptor for an installed binary', async () => {
    const binary = join(tempDir, process.platform === 'win32' ? 'cambridge-lsp.exe' : 'cambridge-lsp');
    await writeFile(binary, 'installed');

    const code = await runCli(io({ CAMBRIDGE_LSP_INSTALL_DIR: tempDir }));

    expect(code).toBe(0);
    expect(stdout).toEqual([`${JSON.stringify({ command: binary, args: [], env: {} })}\n`]);
    expect(stderr).toEqual([]);
  });

  it('should print the error and exit with 1 on invalid configuration', async () => {
    const code = await runCli(io({ CAMBRIDGE_LSP_STRATEGY: 'bundled' }));

    expect(code).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toMatch(/^Invalid configuration: strategy: .*\n$/);
  });
});
