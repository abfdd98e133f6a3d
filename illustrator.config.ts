/**
 * Illustrator Configuration
 * One immutable settings object built at startup from the environment and
 * CLI overrides; components receive their slice of it explicitly.
 */

import { z } from 'zod';
import { PROVIDER_DEFAULTS } from './content-engine/m3-illustrate/src/providers/index.js';
import type { ProviderName, ProviderSettings } from './content-engine/m3-illustrate/src/types.js';
import { ConfigError } from './content-engine/utils/errors.js';

const PROVIDER_NAMES = ['hf-inference', 'openai-images', 'horde'] as const satisfies readonly ProviderName[];
const TRUE_VALUES = ['1', 'true', 'yes', 'on'];

const flag = (fallback: boolean) =>
  z.preprocess(value => (typeof value === 'string' ? TRUE_VALUES.includes(value.toLowerCase()) : value), z.boolean()).default(fallback);

const integer = (fallback: number, min: number, max: number) => z.coerce.number().int().min(min).max(max).default(fallback);

const ProviderSchema = z.object({
  name: z.enum(PROVIDER_NAMES).default('hf-inference'),
  endpoint: z.string().url().optional(),
  apiKey: z.string().optional(),
  model: z.string().min(1).optional(),
  steps: integer(20, 1, 150),
  guidance: z.coerce.number().min(0).max(30).default(7.5),
  requestTimeoutMs: integer(120000, 1000, 600000),
  pollIntervalMs: integer(2000, 100, 60000),
  pollTimeoutMs: integer(300000, 1000, 3600000)
});

const ConfigSchema = z.object({
  inputRoot: z.string().min(1).default('historias'),
  outputRoot: z.string().min(1).default('pdfs_generados'),
  maxImages: integer(6, 0, 50),
  coverImage: flag(true),
  skipImages: flag(false),
  failOnAuthError: flag(false),
  failureMode: z.enum(['placeholder', 'strict']).default('placeholder'),
  promptStrategy: z.enum(['style-prefix', 'keywords']).default('style-prefix'),
  seed: z.coerce.number().int().min(0).optional(),
  appendixMarker: z.string().min(1).default('actividades'),
  cacheEnabled: flag(true),
  cacheDir: z.string().min(1).default('.cache/images'),
  fontPath: z.string().optional(),
  boldFontPath: z.string().optional(),
  requestIntervalMs: integer(3000, 0, 120000),
  retryAttempts: integer(5, 1, 10),
  retryBaseDelayMs: integer(2000, 0, 60000),
  retryMaxDelayMs: integer(30000, 0, 600000),
  concurrency: integer(1, 1, 16),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  provider: ProviderSchema.default({})
});

type ParsedConfig = z.infer<typeof ConfigSchema>;

export type IllustratorConfig = Readonly<Omit<ParsedConfig, 'provider'> & { provider: Readonly<ProviderSettings> }>;

export type ConfigOverrides = Partial<Omit<ParsedConfig, 'provider'>> & {
  provider?: Partial<ProviderSettings>;
};

export type Environment = Record<string, string | undefined>;

/**
 * Build the run configuration. Precedence: overrides, then environment, then defaults.
 * Throws `ConfigError` listing every invalid setting.
 */
export function loadIllustratorConfig(env: Environment = process.env, overrides: ConfigOverrides = {}): IllustratorConfig {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const fromEnv = {
    inputRoot: read('ILLUSTRATOR_INPUT_DIR'),
    outputRoot: read('ILLUSTRATOR_OUTPUT_DIR'),
    maxImages: read('ILLUSTRATOR_MAX_IMAGES'),
    coverImage: read('ILLUSTRATOR_COVER_IMAGE'),
    skipImages: read('ILLUSTRATOR_SKIP_IMAGES') ?? read('FAST_MODE'),
    failOnAuthError: read('ILLUSTRATOR_FAIL_ON_AUTH_ERROR'),
    failureMode: read('ILLUSTRATOR_FAILURE_MODE'),
    promptStrategy: read('ILLUSTRATOR_PROMPT_STRATEGY'),
    seed: read('ILLUSTRATOR_SEED'),
    appendixMarker: read('ILLUSTRATOR_APPENDIX_MARKER'),
    cacheEnabled: read('ILLUSTRATOR_CACHE'),
    cacheDir: read('ILLUSTRATOR_CACHE_DIR'),
    fontPath: read('FONT_PATH'),
    boldFontPath: read('FONT_BOLD_PATH'),
    requestIntervalMs: read('ILLUSTRATOR_REQUEST_INTERVAL_MS'),
    retryAttempts: read('ILLUSTRATOR_RETRY_ATTEMPTS'),
    retryBaseDelayMs: read('ILLUSTRATOR_RETRY_BASE_DELAY_MS'),
    retryMaxDelayMs: read('ILLUSTRATOR_RETRY_MAX_DELAY_MS'),
    concurrency: read('ILLUSTRATOR_CONCURRENCY'),
    logLevel: read('ILLUSTRATOR_LOG_LEVEL')
  };

  const providerName = overrides.provider?.name ?? read('ILLUSTRATOR_PROVIDER');
  const providerFromEnv = {
    name: providerName,
    endpoint: read('ILLUSTRATOR_PROVIDER_ENDPOINT') ?? (providerName === 'openai-images' ? read('IMAGEROUTER_BASE_URL') : undefined),
    apiKey: read('ILLUSTRATOR_API_KEY') ?? credentialFor(providerName, read),
    model: read('ILLUSTRATOR_MODEL') ?? (providerName === undefined || providerName === 'hf-inference' ? read('HF_MODEL_ID') : undefined),
    steps: read('ILLUSTRATOR_STEPS'),
    guidance: read('ILLUSTRATOR_GUIDANCE'),
    requestTimeoutMs: read('ILLUSTRATOR_REQUEST_TIMEOUT_MS'),
    pollIntervalMs: read('ILLUSTRATOR_POLL_INTERVAL_MS'),
    pollTimeoutMs: read('ILLUSTRATOR_POLL_TIMEOUT_MS')
  };

  const { provider: providerOverrides = {}, ...topLevelOverrides } = overrides;
  const parsed = ConfigSchema.safeParse({
    ...definedValues(fromEnv, topLevelOverrides),
    provider: definedValues(providerFromEnv, providerOverrides)
  });

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  const { provider, ...rest } = parsed.data;
  const defaults = PROVIDER_DEFAULTS[provider.name];

  return Object.freeze({
    ...rest,
    provider: Object.freeze({
      ...provider,
      endpoint: provider.endpoint ?? defaults.endpoint,
      model: provider.model ?? defaults.model
    })
  });
}

function credentialFor(provider: string | undefined, read: (name: string) => string | undefined): string | undefined {
  switch (provider) {
    case 'openai-images':
      return read('IMAGEROUTER_API_KEY') ?? read('OPENAI_API_KEY');
    case 'horde':
      return read('HORDE_API_KEY');
    default:
      return read('HF_TOKEN');
  }
}

/**
 * Later sources win, but an undefined value never masks an earlier one.
 */
function definedValues(...sources: object[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  return merged;
}
