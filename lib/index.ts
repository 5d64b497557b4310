/**
 * @format
 * EC2 Details - Central Export
 */

export * from './config/defaults';
export * from './errors';

export * from './lookup/types';
export * from './lookup/instance-resolver';
export * from './lookup/volume-fetcher';
export * from './lookup/enrichment';
export * from './lookup/pipeline';

export * from './report/structured';
export * from './report/text';

export { defaultOutputPath, sanitizeFileName } from './utilities/naming';
export { default as logger, LogLevel, type Logger } from './utilities/logger';
