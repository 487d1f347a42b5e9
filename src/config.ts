import { z } from 'zod';
import { DEFAULT_RELEASE_BASE_URL, DEFAULT_RELEASE_TAG } from './resolver/platforms.js';
import { ConfigError } from './utils/errors.js';

export const ResolverConfigSchema = z.object({
  strategy: z.enum(['download', 'search-path']).default('download'),
  binaryName: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, 'must be a file name, not a path')
    .default('cambridge-lsp'),
  installDir: z.string().min(1).default('.'),
  releaseTag: z.string().min(1).default(DEFAULT_RELEASE_TAG),
  releaseBaseUrl: z
    .string()
    .url()
    .refine((value) => value.startsWith('https://'), 'must be an https URL')
    .default(DEFAULT_RELEASE_BASE_URL),
});

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;
export type ResolverConfigInput = z.input<typeof ResolverConfigSchema>;
export type ResolutionStrategy = ResolverConfig['strategy'];

const ENV_KEYS: Record<keyof ResolverConfig, string> = {
  strategy: 'CAMBRIDGE_LSP_STRATEGY',
  binaryName: 'CAMBRIDGE_LSP_BINARY_NAME',
  installDir: 'CAMBRIDGE_LSP_INSTALL_DIR',
  releaseTag: 'CAMBRIDGE_LSP_RELEASE_TAG',
  releaseBaseUrl: 'CAMBRIDGE_LSP_RELEASE_BASE_URL',
};

export function parseConfig(input: ResolverConfigInput = {}): ResolverConfig {
  return validateConfig(input);
}

function validateConfig(input: unknown): ResolverConfig {
  const result = ResolverConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Build the resolver configuration from CAMBRIDGE_LSP_* environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
  const input: Record<string, string> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      input[field] = value;
    }
  }
  return validateConfig(input);
}
