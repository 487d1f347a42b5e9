import { parseConfig, type ResolverConfig, type ResolverConfigInput } from './config.js';
import { BinaryResolver } from './resolver/binary-resolver.js';
import type { HostApi, LanguageServerCommand, Worktree } from './types/host.js';

export const LANGUAGE_SERVER_ID = 'cambridge-lsp';

/**
 * Plugin instance created once by the host. Owns the resolver and with it the
 * cached binary path for the lifetime of the plugin.
 */
export class CambridgeExtension {
  readonly config: ResolverConfig;
  private readonly resolver: BinaryResolver;

  constructor(host: HostApi, config: ResolverConfigInput = {}) {
    this.config = parseConfig(config);
    this.resolver = new BinaryResolver(host, this.config);
  }

  async languageServerCommand(
    languageServerId: string,
    worktree: Worktree
  ): Promise<LanguageServerCommand> {
    const command = await this.resolver.resolve(languageServerId, worktree);
    return { command, args: [], env: {} };
  }
}
