import { availableParallelism } from 'node:os';
import { ConfigError } from './errors';

export type LineStrategy = 'smallest-segments' | 'splitting-line';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface AnalysisConfig {
  /** Size of the intersection worker pool */
  numWorkers: number;
  lineStrategy: LineStrategy;
  logLevel: LogLevel;
  /** Node capacity of the section spatial index */
  spatialIndexMaxEntries: number;
}

const LINE_STRATEGIES: readonly LineStrategy[] = ['smallest-segments', 'splitting-line'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  numWorkers: Math.max(1, availableParallelism()),
  lineStrategy: 'smallest-segments',
  logLevel: 'info',
  spatialIndexMaxEntries: 16,
};

export function createAnalysisConfig(overrides?: Partial<AnalysisConfig>): AnalysisConfig {
  const config: AnalysisConfig = { ...DEFAULT_ANALYSIS_CONFIG, ...overrides };

  if (!Number.isInteger(config.numWorkers) || config.numWorkers < 1) {
    throw new ConfigError(`numWorkers must be an integer greater equal 1, but is ${config.numWorkers}`);
  }
  if (!LINE_STRATEGIES.includes(config.lineStrategy)) {
    throw new ConfigError(`Unknown line strategy '${config.lineStrategy}'`);
  }
  if (!LOG_LEVELS.includes(config.logLevel)) {
    throw new ConfigError(`Unknown log level '${config.logLevel}'`);
  }
  if (!Number.isInteger(config.spatialIndexMaxEntries) || config.spatialIndexMaxEntries < 4) {
    throw new ConfigError('spatialIndexMaxEntries must be an integer greater equal 4');
  }

  return Object.freeze(config);
}
