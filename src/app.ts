/**
 * Application runner: arguments → settings → requests → orchestrator →
 * reports → exit code. `main.ts` only adds the process wiring.
 */

import './providers/index.js';
import { resolve } from 'node:path';
import { parseArgs, argsToConfig, showHelp, VERSION, type CLIArgs } from './cli.js';
import { loadConfig, mergeSettings, type Settings } from './config/index.js';
import { initializeEnvironment, checkCredentials } from './env.js';
import { loadCaseFile } from './workflow/cases.js';
import { WorkflowOrchestrator } from './workflow/orchestrator.js';
import type { ContentModelFactory } from './providers/content-model.js';
import { createWorkflowRequest, summarize, type WorkflowRequest, type WorkflowResult } from './types.js';
import { ConsoleReporter, JSONReporter, type Reporter } from './reporters/index.js';
import { ConfigurationError, formatError } from './errors/index.js';
import { configureLogger, createComponentLogger, ConsoleSink, type LogSink } from './utilities/logger.js';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CONFIG = 2;

export interface AppOptions {
  /** Working directory for config, .env and relative paths */
  cwd?: string;
  signal?: AbortSignal;
  /** Report output (default process.stdout) */
  stdout?: (text: string) => void;
  /** Error output (default process.stderr) */
  stderr?: (text: string) => void;
  /** Log sinks (default console) */
  logSinks?: LogSink[];
  /** Model resolution override */
  models?: ContentModelFactory;
}

export interface AppOutcome {
  exitCode: number;
  results: WorkflowResult[];
}

/**
 * Run the CLI against `argv` and return the exit code with the results.
 * Configuration errors are reported and turned into exit code 2.
 */
export async function runApp(argv: string[], options: AppOptions = {}): Promise<AppOutcome> {
  const stdout = options.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = options.stderr ?? ((text: string) => process.stderr.write(text));

  try {
    return await execute(argv, options, stdout);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      stderr(`${formatError(error)}\n`);
      return { exitCode: EXIT_CONFIG, results: [] };
    }
    throw error;
  }
}

async function execute(argv: string[], options: AppOptions, stdout: (text: string) => void): Promise<AppOutcome> {
  const cwd = options.cwd ?? process.cwd();
  const args = parseArgs(argv);

  if (args.help) {
    showHelp(stdout);
    return { exitCode: EXIT_OK, results: [] };
  }
  if (args.version) {
    stdout(`chart-reflect v${VERSION}\n`);
    return { exitCode: EXIT_OK, results: [] };
  }

  // The secrets file may carry CHART_REFLECT_* settings: load it first
  const report = initializeEnvironment({
    envFile: resolve(cwd, args.envFile ?? '.env'),
    requireEnvFile: args.envFile !== undefined,
  });

  const { settings: fileSettings, warnings } = loadConfig({ cwd });
  const settings = mergeSettings(fileSettings, argsToConfig(args));

  configureLogger({ level: settings.logLevel, sinks: options.logSinks ?? [new ConsoleSink()] });
  const log = createComponentLogger('cli');
  log.debug('Environment initialised', { ...report });
  for (const warning of warnings) {
    log.warn(warning);
  }

  const requests = await buildRequests(args, settings, cwd);

  // Fail on missing keys before any model call
  const providers = checkCredentials(requests.flatMap((r) => [r.generationModel, r.reflectionModel]));
  log.debug('Providers resolved', { providers: providers.map((p) => p.name) });

  const reporters: Reporter[] = [new ConsoleReporter({ write: stdout })];
  if (args.report) {
    reporters.push(new JSONReporter(resolve(cwd, args.report)));
  }

  const orchestrator = new WorkflowOrchestrator({
    concurrency: settings.concurrency,
    maxModelCalls: settings.maxModelCalls,
    timeoutMs: settings.timeoutMs,
    sampleRows: settings.sampleRows,
    models: options.models,
    onProgress: (event) => {
      if (event.type === 'request.complete') {
        for (const reporter of reporters) reporter.reportResult(event.result);
      }
    },
  });

  const startTime = Date.now();
  const results = await orchestrator.run(requests, { signal: options.signal });
  const summary = summarize(results, Date.now() - startTime);

  for (const reporter of reporters) {
    reporter.reportSummary(results, summary);
    await reporter.finalize();
  }

  return {
    exitCode: results.some((r) => r.status === 'failed') ? EXIT_FAILED : EXIT_OK,
    results,
  };
}

async function buildRequests(args: CLIArgs, settings: Settings, cwd: string): Promise<WorkflowRequest[]> {
  const defaults = {
    generationModel: settings.generationModel,
    reflectionModel: settings.reflectionModel,
    outputDir: resolve(cwd, settings.outputDir),
    caseLabel: settings.caseLabel,
    overwrite: settings.overwrite,
  };

  if (args.cases) {
    if (args.dataset !== undefined) {
      throw new ConfigurationError('Pass either a dataset or --cases, not both', ['--cases']);
    }
    return loadCaseFile(resolve(cwd, args.cases), defaults);
  }

  if (args.dataset === undefined) {
    throw new ConfigurationError('Missing dataset (see --help)', ['dataset']);
  }

  return [
    createWorkflowRequest({
      datasetReference: /^[a-z][a-z\d+.-]*:\/\//i.test(args.dataset) ? args.dataset : resolve(cwd, args.dataset),
      instruction: args.instruction ?? '',
      generationModel: defaults.generationModel,
      reflectionModel: defaults.reflectionModel,
      outputDirectory: defaults.outputDir,
      caseLabel: defaults.caseLabel,
      caseGroup: args.caseGroup,
      overwrite: defaults.overwrite,
    }),
  ];
}
