import { createWriteStream } from 'fs';
import { chmod, mkdir, rm } from 'fs/promises';
import { get } from 'https';
import type { IncomingMessage } from 'http';
import { dirname } from 'path';
import { pipeline } from 'stream/promises';
import { createGunzip } from 'zlib';
import type {
  Architecture,
  DownloadedFileType,
  HostApi,
  InstallationStatus,
  Os,
  PlatformKey,
  Worktree,
} from '../types/host.js';
import { UnsupportedPlatformError } from '../utils/errors.js';
import { logger as baseLogger } from '../utils/logger.js';
import { which, type CommandOptions } from './command.js';

const logger = baseLogger.child({ component: 'node-host' });

const MAX_REDIRECTS = 5;
const REDIRECT_STATUSES = [301, 302, 303, 307, 308];
export const ALLOWED_DOWNLOAD_HOSTS = [
  'github.com',
  'objects.githubusercontent.com',
  'release-assets.githubusercontent.com',
  'github-releases.githubusercontent.com',
];

const OS_BY_PLATFORM: Partial<Record<NodeJS.Platform, Os>> = {
  darwin: 'mac',
  linux: 'linux',
  win32: 'windows',
};

const ARCH_BY_NODE_ARCH: Partial<Record<string, Architecture>> = {
  arm64: 'aarch64',
  ia32: 'x86',
  x64: 'x86_64',
};

export type StatusListener = (languageServerId: string, status: InstallationStatus) => void;

export interface NodeHostOptions {
  platform?: NodeJS.Platform;
  arch?: string;
  onStatus?: StatusListener;
}

/**
 * Host effects implemented on top of Node.js, for embedding layers that do
 * not provide their own
 */
export class NodeHost implements HostApi {
  private readonly platform: NodeJS.Platform;
  private readonly arch: string;

  constructor(private readonly options: NodeHostOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.arch = options.arch ?? process.arch;
  }

  currentPlatform(): PlatformKey {
    const os = OS_BY_PLATFORM[this.platform];
    if (!os) {
      throw new UnsupportedPlatformError(`${this.platform}-${this.arch}`);
    }
    return { os, arch: ARCH_BY_NODE_ARCH[this.arch] ?? 'other' };
  }

  async downloadFile(
    url: string,
    destPath: string,
    fileType: DownloadedFileType,
    redirectCount = 0
  ): Promise<void> {
    if (redirectCount > MAX_REDIRECTS) {
      throw new Error(`Too many redirects (max ${MAX_REDIRECTS})`);
    }
    assertAllowedUrl(url);

    const response = await request(url);
    const status = response.statusCode ?? 0;

    if (REDIRECT_STATUSES.includes(status)) {
      response.resume();
      const location = response.headers.location;
      if (!location) {
        throw new Error('Redirect URL not found');
      }
      const next = new URL(location, url).toString();
      logger.debug({ from: url, to: next }, 'Following redirect');
      return this.downloadFile(next, destPath, fileType, redirectCount + 1);
    }

    if (status !== 200) {
      response.resume();
      throw new Error(`HTTP ${status}`);
    }

    await mkdir(dirname(destPath), { recursive: true });
    try {
      if (fileType === 'gzip') {
        await pipeline(response, createGunzip(), createWriteStream(destPath));
      } else {
        await pipeline(response, createWriteStream(destPath));
      }
    } catch (error) {
      // never leave a partial binary at the install path
      await rm(destPath, { force: true });
      throw error;
    }
    logger.info({ path: destPath }, 'Download complete');
  }

  async makeFileExecutable(path: string): Promise<void> {
    await chmod(path, 0o755);
  }

  setInstallationStatus(languageServerId: string, status: InstallationStatus): void {
    logger.info({ languageServerId, status }, 'Installation status changed');
    this.options.onStatus?.(languageServerId, status);
  }
}

export class NodeWorktree implements Worktree {
  constructor(
    public readonly rootPath: string = process.cwd(),
    private readonly commandOptions: CommandOptions = {}
  ) {}

  which(name: string): Promise<string | undefined> {
    return which(name, { cwd: this.rootPath, ...this.commandOptions });
  }
}

function assertAllowedUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(`Invalid download URL: ${url}`);
  }
  if (parsed.protocol !== 'https:') {
    throw new Error('Only HTTPS URLs are allowed for downloads');
  }
  if (!ALLOWED_DOWNLOAD_HOSTS.includes(parsed.hostname)) {
    throw new Error(`Download host not allowed: ${parsed.hostname}`);
  }
}

function request(url: string): Promise<IncomingMessage> {
  return new Promise((resolve, reject) => {
    get(url, { headers: { 'User-Agent': 'cambridge-lsp-resolver' } }, resolve).on(
      'error',
      reject
    );
  });
}
