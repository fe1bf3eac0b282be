/**
 * Barrel export for all shared types.
 */
export { DEFAULT_TARGET_ROR } from './work.js';
export type {
    OpenAlexWork,
    OpenAlexAuthorship,
    OpenAlexInstitution,
    OpenAlexWorksPage,
} from './work.js';
export type {
    CollaborationRecord,
    CountryAggregate,
    DatasetRecord,
    CountryInfo,
    CountryTable,
    CountryCache,
    CollaborationReportEntry,
} from './report.js';
export { DEFAULT_CONFIG, LOG_LEVELS, isLogLevel } from './config.js';
export type { CollabMapConfig, LogLevel } from './config.js';
