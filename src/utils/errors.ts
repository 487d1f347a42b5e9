export type ResolverErrorCode =
  | 'UNSUPPORTED_PLATFORM'
  | 'DOWNLOAD_FAILED'
  | 'MAKE_EXECUTABLE_FAILED'
  | 'BINARY_NOT_FOUND'
  | 'CONFIG_ERROR';

export class ResolverError extends Error {
  constructor(
    message: string,
    public readonly code: ResolverErrorCode,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ResolverError';
  }
}

export class UnsupportedPlatformError extends ResolverError {
  constructor(public readonly platform: string) {
    super(`Unsupported platform: ${platform}`, 'UNSUPPORTED_PLATFORM');
    this.name = 'UnsupportedPlatformError';
  }
}

export class DownloadFailedError extends ResolverError {
  constructor(
    public readonly url: string,
    cause: unknown
  ) {
    super(`Failed to download language server: ${describeCause(cause)}`, 'DOWNLOAD_FAILED', cause);
    this.name = 'DownloadFailedError';
  }
}

/**
 * Keeps the message of the underlying filesystem error as-is
 */
export class MakeExecutableFailedError extends ResolverError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(describeCause(cause), 'MAKE_EXECUTABLE_FAILED', cause);
    this.name = 'MakeExecutableFailedError';
  }
}

export class BinaryNotFoundError extends ResolverError {
  constructor(public readonly binaryName: string) {
    super(
      `${binaryName} not found on PATH. ` +
        `Please build ${binaryName} and place it in a directory on your PATH.`,
      'BINARY_NOT_FOUND'
    );
    this.name = 'BinaryNotFoundError';
  }
}

export class ConfigError extends ResolverError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * Human-readable message handed to the host for display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
