export { CambridgeExtension, LANGUAGE_SERVER_ID } from './extension.js';
export { BinaryResolver, isRegularFile } from './resolver/binary-resolver.js';
export {
  DEFAULT_RELEASE_BASE_URL,
  DEFAULT_RELEASE_TAG,
  RELEASE_ASSETS,
  findReleaseAsset,
  formatPlatform,
  resolveDownloadUrl,
  type ReleaseAsset,
  type ReleaseSource,
} from './resolver/platforms.js';
export {
  loadConfigFromEnv,
  parseConfig,
  ResolverConfigSchema,
  type ResolutionStrategy,
  type ResolverConfig,
  type ResolverConfigInput,
} from './config.js';
export {
  NodeHost,
  NodeWorktree,
  type NodeHostOptions,
  type StatusListener,
} from './host/node-host.js';
export { runCli } from './cli.js';
export * from './types/host.js';
export * from './utils/errors.js';
