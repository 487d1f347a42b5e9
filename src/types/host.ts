export type Os = 'mac' | 'linux' | 'windows';

/** `other` covers architectures without a dedicated release build */
export type Architecture = 'aarch64' | 'x86' | 'x86_64' | 'other';

export interface PlatformKey {
  os: Os;
  arch: Architecture;
}

/**
 * Coarse progress of locating or fetching the language server, shown by the host
 */
export type InstallationStatus = 'checking-for-update' | 'downloading' | 'none';

export type DownloadedFileType = 'uncompressed' | 'gzip';

/**
 * Effects provided by the editor host. The resolver only consumes these.
 */
export interface HostApi {
  currentPlatform(): PlatformKey;
  downloadFile(url: string, destPath: string, fileType: DownloadedFileType): Promise<void>;
  makeFileExecutable(path: string): Promise<void>;
  setInstallationStatus(languageServerId: string, status: InstallationStatus): void;
}

export interface Worktree {
  rootPath: string;
  /** Looks the name up on the host's executable search path */
  which(name: string): Promise<string | undefined>;
}

/**
 * What the host spawns as the language server process
 */
export interface LanguageServerCommand {
  command: string;
  args: string[];
  env: Record<string, string>;
}
