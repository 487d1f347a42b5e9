#!/usr/bin/env node
import { loadConfigFromEnv } from './config.js';
import { CambridgeExtension, LANGUAGE_SERVER_ID } from './extension.js';
import { NodeHost, NodeWorktree } from './host/node-host.js';
import { formatError } from './utils/errors.js';
import { logger } from './utils/logger.js';

export interface CliIo {
  env: NodeJS.ProcessEnv;
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

/**
 * Resolve the language server and print its command descriptor as JSON
 * @returns the process exit code
 */
export async function runCli(io: CliIo): Promise<number> {
  try {
    const extension = new CambridgeExtension(new NodeHost(), loadConfigFromEnv(io.env));
    const command = await extension.languageServerCommand(
      LANGUAGE_SERVER_ID,
      new NodeWorktree(io.cwd)
    );
    io.stdout(`${JSON.stringify(command)}\n`);
    return 0;
  } catch (error) {
    logger.debug({ error }, 'Language server resolution failed');
    io.stderr(`${formatError(error)}\n`);
    return 1;
  }
}

if (require.main === module) {
  runCli({
    env: process.env,
    cwd: process.cwd(),
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error({ error }, 'Unhandled error');
      process.exit(1);
    });
}
