import type { ConfigOverrides } from '../illustrator.config.js';
import type { ProviderName } from '../content-engine/m3-illustrate/src/types.js';
import type { LogLevel } from '../content-engine/utils/logger.js';
import { ConfigError } from '../content-engine/utils/errors.js';

export interface CliArgs {
  files: string[];
  listFile?: string;
  overrides: ConfigOverrides;
  help: boolean;
}

export const USAGE = `Usage: lesson-illustrator [options] [file.md ...]

Options:
  -i, --input-folder <dir>    Input root scanned for .md files (default: historias)
  -o, --output-folder <dir>   Output root; input directories are mirrored (default: pdfs_generados)
      --list-file <file>      File with one .md path per line
      --provider <name>       hf-inference | openai-images | horde
      --model <id>            Provider model identifier
      --max-images <n>        Illustrations per document
      --prompt-strategy <s>   style-prefix | keywords
      --seed <n>              Fixed generation seed
      --concurrency <n>       Documents rendered in parallel
      --log-level <level>     debug | info | warn | error
      --skip-images           Placeholders only, no provider calls
      --strict                Render text instead of placeholders when generation fails
      --fail-on-auth-error    Stop the batch when the provider rejects the credential
      --no-cover              No cover illustration on the title page
      --no-cache              Do not read or write the image cache
  -h, --help                  Show this help`;

const PROVIDERS: readonly ProviderName[] = ['hf-inference', 'openai-images', 'horde'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const PROMPT_STRATEGIES = ['style-prefix', 'keywords'] as const;

function oneOf<T extends string>(flag: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new ConfigError([`${flag}: expected one of ${allowed.join(', ')}, got "${value}"`]);
  }
  return match;
}

/**
 * Flags map onto `ConfigOverrides`; anything not starting with `-` is an input file.
 * Numeric values are passed through unchecked and validated with the rest of the config.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { files: [], overrides: {}, help: false };
  const overrides = args.overrides;
  const provider: NonNullable<ConfigOverrides['provider']> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = (): string => {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new ConfigError([`${arg}: missing value`]);
      }
      i++;
      return next;
    };

    switch (arg) {
      case '-i':
      case '--input-folder':
        overrides.inputRoot = value();
        break;
      case '-o':
      case '--output-folder':
        overrides.outputRoot = value();
        break;
      case '--list-file':
        args.listFile = value();
        break;
      case '--provider':
        provider.name = oneOf(arg, value(), PROVIDERS);
        break;
      case '--model':
        provider.model = value();
        break;
      case '--max-images':
        overrides.maxImages = Number(value());
        break;
      case '--prompt-strategy':
        overrides.promptStrategy = oneOf(arg, value(), PROMPT_STRATEGIES);
        break;
      case '--seed':
        overrides.seed = Number(value());
        break;
      case '--concurrency':
        overrides.concurrency = Number(value());
        break;
      case '--log-level':
        overrides.logLevel = oneOf(arg, value(), LOG_LEVELS);
        break;
      case '--skip-images':
        overrides.skipImages = true;
        break;
      case '--strict':
        overrides.failureMode = 'strict';
        break;
      case '--fail-on-auth-error':
        overrides.failOnAuthError = true;
        break;
      case '--no-cover':
        overrides.coverImage = false;
        break;
      case '--no-cache':
        overrides.cacheEnabled = false;
        break;
      case '-h':
      case '--help':
        args.help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new ConfigError([`${arg}: unknown option`]);
        }
        args.files.push(arg);
    }
  }

  if (Object.keys(provider).length > 0) {
    overrides.provider = provider;
  }
  return args;
}
