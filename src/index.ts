export * from './geometry';
export * from './domain';
export * from './intersection';
export * from './eventlist';
export * from './parallel';
export * from './cutting';
export * from './repository';
export * from './application';
export * from './errors';
export { DEFAULT_ANALYSIS_CONFIG, createAnalysisConfig } from './config';
export type { AnalysisConfig, LineStrategy, LogLevel } from './config';
export { logger, setLogLevel, getLogLevel } from './logger';
