import { stat } from 'fs/promises';
import { resolve as resolvePath } from 'path';
import type { ResolverConfig } from '../config.js';
import type { HostApi, Os, Worktree } from '../types/host.js';
import {
  BinaryNotFoundError,
  DownloadFailedError,
  MakeExecutableFailedError,
} from '../utils/errors.js';
import { logger as baseLogger } from '../utils/logger.js';
import { formatPlatform, resolveDownloadUrl } from './platforms.js';

const logger = baseLogger.child({ component: 'binary-resolver' });

/**
 * True only for an existing regular file; directories and missing paths are false
 */
export async function isRegularFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Locates the language server binary, either on the search path or by
 * downloading the release asset for the current platform.
 *
 * The host invokes at most one resolution at a time per instance, so the
 * cached path needs no synchronization.
 */
export class BinaryResolver {
  private cachedPath: string | undefined;

  constructor(
    private readonly host: HostApi,
    private readonly config: ResolverConfig
  ) {}

  get cached(): string | undefined {
    return this.cachedPath;
  }

  async resolve(languageServerId: string, worktree: Worktree): Promise<string> {
    if (this.cachedPath !== undefined) {
      if (await isRegularFile(this.cachedPath)) {
        return this.cachedPath;
      }
      logger.debug({ path: this.cachedPath }, 'Cached language server path is stale');
      this.cachedPath = undefined;
    }

    return this.config.strategy === 'search-path'
      ? this.resolveFromSearchPath(worktree)
      : this.resolveByDownload(languageServerId);
  }

  /**
   * Fixed location of the downloaded binary; Windows builds carry `.exe`
   */
  localBinaryPath(os: Os): string {
    const name = this.config.binaryName;
    const fileName = os === 'windows' && !name.endsWith('.exe') ? `${name}.exe` : name;
    return resolvePath(this.config.installDir, fileName);
  }

  /**
   * A binary already in the install directory, looked up without asking the
   * host for its platform
   */
  private async findInstalledBinary(): Promise<string | undefined> {
    const name = this.config.binaryName;
    const candidates = name.endsWith('.exe') ? [name] : [name, `${name}.exe`];
    for (const candidate of candidates) {
      const path = resolvePath(this.config.installDir, candidate);
      if (await isRegularFile(path)) {
        return path;
      }
    }
    return undefined;
  }

  private async resolveFromSearchPath(worktree: Worktree): Promise<string> {
    const found = await worktree.which(this.config.binaryName);
    if (!found) {
      throw new BinaryNotFoundError(this.config.binaryName);
    }

    logger.info({ path: found }, 'Found language server on PATH');
    this.cachedPath = found;
    return found;
  }

  private async resolveByDownload(languageServerId: string): Promise<string> {
    this.host.setInstallationStatus(languageServerId, 'checking-for-update');

    let binaryPath = await this.findInstalledBinary();

    if (binaryPath === undefined) {
      this.host.setInstallationStatus(languageServerId, 'downloading');

      const platform = this.host.currentPlatform();
      binaryPath = this.localBinaryPath(platform.os);
      const url = resolveDownloadUrl(platform, {
        baseUrl: this.config.releaseBaseUrl,
        tag: this.config.releaseTag,
      });

      logger.info(
        { url, path: binaryPath, platform: formatPlatform(platform) },
        'Downloading language server'
      );

      try {
        await this.host.downloadFile(url, binaryPath, 'uncompressed');
      } catch (error) {
        throw new DownloadFailedError(url, error);
      }

      try {
        await this.host.makeFileExecutable(binaryPath);
      } catch (error) {
        throw new MakeExecutableFailedError(binaryPath, error);
      }
    }

    this.cachedPath = binaryPath;
    this.host.setInstallationStatus(languageServerId, 'none');
    return binaryPath;
  }
}
