export { convertFile } from './convert';
export type { ConvertOptions, ConvertResult, ConvertFailureReason, RecordFailure } from './convert';
export { CsvWriter, formatCell, formatRow } from './csv';
export { readRecords, decodeLine } from './source';
export type { SourceItem } from './source';
export { deriveOutputPath } from './paths';
export { loadConfig, findUp, DEFAULT_FEATURES, CONFIG_FILE } from './config';
export type { LoadConfigOptions, LoadedConfig } from './config';
export { createLogger, silentLogger } from './logger';
export type { BaseLogger } from './logger';
