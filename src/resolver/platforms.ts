import type { Architecture, Os, PlatformKey } from '../types/host.js';
import { UnsupportedPlatformError } from '../utils/errors.js';

export const DEFAULT_RELEASE_BASE_URL =
  'https://github.com/andrinoff/cambridge-lang/releases/download';
export const DEFAULT_RELEASE_TAG = 'v0.1.0';

export interface ReleaseSource {
  baseUrl: string;
  tag: string;
}

export interface ReleaseAsset {
  os: Os;
  // undefined matches every architecture (single-binary releases)
  arch?: Architecture;
  asset: string;
}

export const RELEASE_ASSETS: readonly ReleaseAsset[] = [
  { os: 'mac', arch: 'aarch64', asset: 'cambridge-lsp-macos-arm64' },
  { os: 'mac', arch: 'x86_64', asset: 'cambridge-lsp-macos-intel' },
  { os: 'linux', asset: 'cambridge-lsp-linux' },
  { os: 'windows', asset: 'cambridge-lsp.exe' },
];

export function formatPlatform(platform: PlatformKey): string {
  return `${platform.os}-${platform.arch}`;
}

export function findReleaseAsset(platform: PlatformKey): string | undefined {
  const entry = RELEASE_ASSETS.find(
    (candidate) =>
      candidate.os === platform.os &&
      (candidate.arch === undefined || candidate.arch === platform.arch)
  );
  return entry?.asset;
}

/**
 * Resolve the download URL of the prebuilt language server for a platform
 * @throws UnsupportedPlatformError when no release asset exists for the platform
 */
export function resolveDownloadUrl(
  platform: PlatformKey,
  release: ReleaseSource = { baseUrl: DEFAULT_RELEASE_BASE_URL, tag: DEFAULT_RELEASE_TAG }
): string {
  const asset = findReleaseAsset(platform);
  if (!asset) {
    throw new UnsupportedPlatformError(formatPlatform(platform));
  }
  const baseUrl = release.baseUrl.replace(/\/+$/, '');
  return `${baseUrl}/${release.tag}/${asset}`;
}
