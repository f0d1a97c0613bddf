export type { Reporter } from './types.js';
export { ConsoleReporter, formatResult, formatSummary, type ConsoleReporterOptions } from './console-reporter.js';
export {
  JSONReporter,
  buildRunReport,
  toResultReport,
  type RunReport,
  type ResultReport,
  type ArtifactReport,
} from './json-reporter.js';
