/**
 * CLI Argument Parsing and Help
 */

import chalk from 'chalk';
import { ConfigurationError } from './errors/index.js';
import { isLogLevel, type LogLevel } from './utilities/logger.js';
import type { WorkflowConfig } from './config/index.js';

export const VERSION = '0.1.0';

/**
 * CLI arguments structure. Options left undefined fall through to config
 * files, environment and defaults.
 */
export interface CLIArgs {
  help: boolean;
  version: boolean;
  dataset?: string;
  instruction?: string;
  /** Batch file replacing the positionals */
  cases?: string;
  generationModel?: string;
  reflectionModel?: string;
  outputDir?: string;
  caseLabel?: string;
  caseGroup?: string;
  sampleRows?: number;
  concurrency?: number;
  maxModelCalls?: number;
  timeoutMs?: number;
  overwrite?: boolean;
  report?: string;
  envFile?: string;
  logLevel?: LogLevel;
}

type StringOption = 'cases' | 'generationModel' | 'reflectionModel' | 'outputDir' | 'caseLabel' | 'caseGroup' | 'report' | 'envFile';
type NumberOption = 'sampleRows' | 'concurrency' | 'maxModelCalls' | 'timeoutMs';

const STRING_OPTIONS: Record<string, StringOption> = {
  '--cases': 'cases',
  '--generation-model': 'generationModel',
  '-g': 'generationModel',
  '--reflection-model': 'reflectionModel',
  '-r': 'reflectionModel',
  '--output-dir': 'outputDir',
  '-o': 'outputDir',
  '--case-label': 'caseLabel',
  '--case-group': 'caseGroup',
  '--report': 'report',
  '--env-file': 'envFile',
};

const NUMBER_OPTIONS: Record<string, NumberOption> = {
  '--sample-rows': 'sampleRows',
  '--concurrency': 'concurrency',
  '-c': 'concurrency',
  '--max-model-calls': 'maxModelCalls',
  '--timeout': 'timeoutMs',
};

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws ConfigurationError on unknown options, missing values or bad numbers
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): CLIArgs {
  const result: CLIArgs = { help: false, version: false };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i];

    if (raw === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!raw.startsWith('-') || raw === '-') {
      positionals.push(raw);
      continue;
    }

    // --name=value
    const eq = raw.indexOf('=');
    const arg = raw.startsWith('--') && eq > 0 ? raw.slice(0, eq) : raw;
    const inline = arg === raw ? undefined : raw.slice(eq + 1);
    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || (next.startsWith('-') && next !== '-')) {
        throw new ConfigurationError(`Option ${arg} needs a value`, [arg]);
      }
      i++;
      return next;
    };

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--overwrite') {
      result.overwrite = true;
    } else if (arg === '--log-level') {
      const level = value();
      if (!isLogLevel(level)) {
        throw new ConfigurationError(`Unknown log level "${level}"`, [arg]);
      }
      result.logLevel = level;
    } else if (arg in STRING_OPTIONS) {
      result[STRING_OPTIONS[arg]] = value();
    } else if (arg in NUMBER_OPTIONS) {
      result[NUMBER_OPTIONS[arg]] = parsePositiveInt(arg, value());
    } else {
      throw new ConfigurationError(`Unknown option ${arg} (see --help)`, [arg]);
    }
  }

  const [dataset, ...instruction] = positionals;
  if (dataset !== undefined) result.dataset = dataset;
  if (instruction.length > 0) result.instruction = instruction.join(' ');

  return result;
}

function parsePositiveInt(option: string, text: string): number {
  const value = Number(text);
  if (!/^\d+$/.test(text) || !Number.isSafeInteger(value) || value < 1) {
    throw new ConfigurationError(`Option ${option} expects a positive integer, got "${text}"`, [option]);
  }
  return value;
}

/**
 * The flags that map onto config settings.
 */
export function argsToConfig(args: CLIArgs): WorkflowConfig {
  return {
    generationModel: args.generationModel,
    reflectionModel: args.reflectionModel,
    outputDir: args.outputDir,
    caseLabel: args.caseLabel,
    sampleRows: args.sampleRows,
    concurrency: args.concurrency,
    maxModelCalls: args.maxModelCalls,
    timeoutMs: args.timeoutMs,
    overwrite: args.overwrite,
    logLevel: args.logLevel,
  };
}

/**
 * Help text.
 */
export function helpText(): string {
  const rule = chalk.dim('━'.repeat(72));
  return `
${rule}
${chalk.bold('                 CHART-REFLECT - GENERATE, CRITIQUE, REVISE')}
${rule}

Draws a chart (V1) from a dataset with one model, has a second model
critique it against the instruction, and saves the revised chart (V2).

${chalk.bold('USAGE:')}
  chart-reflect <dataset> [instruction] [OPTIONS]
  chart-reflect --cases <file.json> [OPTIONS]

${chalk.bold('OPTIONS:')}
  -h, --help                 Show this help
  -v, --version              Show version (${VERSION})
  -g, --generation-model ID  Model drawing V1 (default: gpt-4o-mini)
  -r, --reflection-model ID  Model critiquing V1 and drawing V2 (default: gpt-4o)
  -o, --output-dir DIR       Where artifacts are written (default: .)
  --case-label LABEL         Label in artifact names (default: chart)
  --case-group GROUP         Sub-directory for this case
  --cases FILE               Run every case in a JSON batch file
  --sample-rows N            Dataset rows shown to the models (default: 5)
  -c, --concurrency N        Requests processed at once (default: 2)
  --max-model-calls N        Model calls in flight at once (default: 4)
  --timeout MS               Per model call time budget (default: 60000)
  --overwrite                Replace artifacts from a previous run
  --report FILE              Write a JSON run report
  --env-file FILE            Secrets file to load (default: .env)
  --log-level LEVEL          debug, info, warn, error, silent (default: info)

${chalk.bold('MODELS:')}
  mock, mock:*               Offline model, no key needed
  claude-*                   Anthropic (ANTHROPIC_API_KEY)
  vendor/model               OpenRouter (OPENROUTER_API_KEY)
  anything else              OpenAI (OPENAI_API_KEY, OPENAI_BASE_URL)

${chalk.bold('EXAMPLES:')}
  ${chalk.dim('# Suggested instruction, default models')}
  chart-reflect data/coffee_sales.csv

  ${chalk.dim('# Explicit instruction and models')}
  chart-reflect data/coffee_sales.csv "show quarterly revenue trend" \\
    -g gpt-4o-mini -r claude-sonnet-4-20250514 -o out

  ${chalk.dim('# Try the workflow offline')}
  chart-reflect data/coffee_sales.csv -g mock -r mock -o out

${chalk.bold('EXIT CODES:')}
  0  every request succeeded or kept V1 only
  1  at least one request failed
  2  configuration error or bad arguments
${rule}
`;
}

export function showHelp(write: (text: string) => void = (text) => process.stdout.write(text)): void {
  write(helpText());
}
