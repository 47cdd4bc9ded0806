import { z } from 'zod';
import { UsageError } from './errors';
import { combinationModes } from './expression';
import { metricNames } from './nearest-neighbor';

export const TABLE_PATH_ENV = 'WORD_ANALOGY_TABLE';

export const USAGE = `Usage: word-analogy [<table-path>] <word> [+|-] <word> ... [options]

Options:
  --mode <expression|sum|average>  how the input words are combined (default: expression)
  --metric <cosine|euclidean>      comparison metric (default: cosine)
  --cosine, --euclidean            shorthands for --metric
  --dim <n>                        expected vector dimension of the table
  --lenient                        skip malformed rows instead of failing
  --top <n>                        number of nearest words to print (default: 1)
  --help                           show this message

The table path may be omitted when ${TABLE_PATH_ENV} is set.`;

const optionsSchema = z.object({
  tablePath: z.string({ required_error: 'a word vector table path is required' }).min(1),
  tokens: z.array(z.string()).min(1, 'at least one word is required'),
  mode: z.enum(combinationModes).default('expression'),
  metric: z.enum(metricNames).default('cosine'),
  dimension: z.coerce.number().int().positive().optional(),
  lenient: z.boolean().default(false),
  top: z.coerce.number().int().positive().default(1),
});
export type AnalogyOptions = z.infer<typeof optionsSchema>;

export type ParsedArguments = { help: true } | ({ help: false } & AnalogyOptions);

const valueOptions = ['mode', 'metric', 'dim', 'top'] as const;
type ValueOption = (typeof valueOptions)[number];
const flagOptions = ['cosine', 'euclidean', 'lenient', 'help'] as const;
type FlagOption = (typeof flagOptions)[number];

function isValueOption(name: string): name is ValueOption {
  return valueOptions.some(option => option === name);
}
function isFlagOption(name: string): name is FlagOption {
  return flagOptions.some(option => option === name);
}

/**
 * Splits argv (without the node executable and script) into positionals and options.
 * Only arguments starting with `--` are options, so `-` and `+` always reach the expression.
 */
export function parseArguments(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedArguments {
  const positionals: string[] = [];
  const values: { [name in ValueOption]?: string } = {};
  const flags: { [name in FlagOption]?: boolean } = {};
  let metric: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (arg === '-h') {
      flags.help = true;
      continue;
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }
    const separator = arg.indexOf('=');
    const name = separator < 0 ? arg.slice(2) : arg.slice(2, separator);
    const inlineValue = separator < 0 ? undefined : arg.slice(separator + 1);
    if (isFlagOption(name)) {
      if (typeof inlineValue === 'string') {
        throw new UsageError(`--${name} does not take a value`);
      }
      flags[name] = true;
      // the metric shorthands and --metric override each other, last one wins
      if (name === 'cosine' || name === 'euclidean') {
        metric = name;
      }
      continue;
    }
    if (!isValueOption(name)) {
      throw new UsageError(`Unknown option --${name}`);
    }
    const value = typeof inlineValue === 'string' ? inlineValue : argv[++i];
    if (typeof value === 'undefined') {
      throw new UsageError(`--${name} requires a value`);
    }
    values[name] = value;
    if (name === 'metric') {
      metric = value;
    }
  }
  if (flags.help) {
    return { help: true };
  }

  const fixedTablePath = env[TABLE_PATH_ENV];
  const [tablePath, ...tokens] = fixedTablePath ? [fixedTablePath, ...positionals] : positionals;
  const result = optionsSchema.safeParse({
    tablePath,
    tokens,
    mode: values.mode,
    metric,
    dimension: values.dim,
    lenient: !!flags.lenient,
    top: values.top,
  });
  if (!result.success) {
    throw new UsageError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('\n'));
  }
  return { help: false, ...result.data };
}
