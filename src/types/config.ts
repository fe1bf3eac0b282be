import { DEFAULT_TARGET_ROR } from './work.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface CollabMapConfig {
    // Target institution
    targetRor: string;
    workType: string;

    // Files
    worksPath: string;
    countryCodesPath: string;
    datasetsOut: string;
    collaborationsOut: string;

    // Harvest
    perPage: number;
    maxWorks?: number;

    // OpenAlex access
    email?: string;
    apiKey?: string;
    lookupDelayMs: number;
    requestTimeoutMs: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CollabMapConfig = {
    targetRor: DEFAULT_TARGET_ROR,
    workType: 'dataset',
    worksPath: 'data/works.json',
    countryCodesPath: 'data/all_country_codes.csv',
    datasetsOut: 'data/all_datasets.json',
    collaborationsOut: 'data/collaborations.json',
    perPage: 200,
    lookupDelayMs: 100,
    requestTimeoutMs: 10000,
    logLevel: 'info',
    jsonLogs: false,
};
