import { Command } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import {
    assertInputs,
    harvestWorks,
    buildDatasetsReport,
    buildCollaborationsReport,
} from '../builder/report-builder.js';
import { LOG_LEVELS, isLogLevel, type CollabMapConfig, type LogLevel } from '../types/index.js';

export const VERSION = '1.0.0';

interface CommonOptions {
    ror?: string;
    works?: string;
    email?: string;
    timeout?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

interface ReportOptions extends CommonOptions {
    countries?: string;
    datasetsOut?: string;
    collaborationsOut?: string;
    delay?: string;
}

interface FetchOptions extends CommonOptions {
    type?: string;
    perPage?: string;
    maxWorks?: string;
}

export type CommandOptions = ReportOptions & FetchOptions;

function parseOptionalInt(value: string | undefined, flag: string): number | undefined {
    if (value === undefined) return undefined;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed < 0) {
        throw new Error(`Invalid value for ${flag}: ${value}`);
    }
    return parsed;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (value === undefined) return undefined;
    if (!isLogLevel(value)) {
        throw new Error(`Invalid log level: ${value}. Valid: ${LOG_LEVELS.join(', ')}`);
    }
    return value;
}

/**
 * Map parsed options onto config keys. Options the user did not pass stay
 * undefined so the config file and environment can supply them.
 */
export function toConfigFlags(opts: CommandOptions): Partial<CollabMapConfig> {
    return {
        targetRor: opts.ror,
        worksPath: opts.works,
        countryCodesPath: opts.countries,
        datasetsOut: opts.datasetsOut,
        collaborationsOut: opts.collaborationsOut,
        workType: opts.type,
        perPage: parseOptionalInt(opts.perPage, '--per-page'),
        maxWorks: parseOptionalInt(opts.maxWorks, '--max-works'),
        email: opts.email,
        lookupDelayMs: parseOptionalInt(opts.delay, '--delay'),
        requestTimeoutMs: parseOptionalInt(opts.timeout, '--timeout'),
        logLevel: parseLogLevel(opts.logLevel),
        jsonLogs: opts.jsonLogs,
    };
}

/**
 * Resolve config, set up logging and HTTP, then run one command.
 * Any failure is reported on one line and sets exit code 1.
 */
async function runCommand(
    opts: CommandOptions,
    task: (config: CollabMapConfig) => Promise<void>
): Promise<void> {
    let config: CollabMapConfig;
    try {
        config = await resolveConfig(toConfigFlags(opts));
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    } catch (error) {
        console.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
        return;
    }

    getHttpClient({ timeout: config.requestTimeoutMs, version: VERSION, email: config.email });

    try {
        await task(config);
    } catch (error) {
        getLogger().error({ error }, error instanceof Error ? error.message : 'Command failed');
        process.exitCode = 1;
    }
}

function withCommonOptions(command: Command): Command {
    return command
        .option('--ror <ror>', 'ROR id of the target institution')
        .option('-w, --works <path>', 'Works JSON file')
        .option('--email <email>', 'Contact email for the OpenAlex polite pool')
        .option('--timeout <ms>', 'Per-request timeout in milliseconds')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent (default: info)')
        .option('--json-logs', 'Output JSON logs');
}

function withReportOptions(command: Command): Command {
    return withCommonOptions(command)
        .option('-c, --countries <path>', 'Country codes CSV file')
        .option('--datasets-out <path>', 'All-datasets report path')
        .option('--collaborations-out <path>', 'Collaborations report path')
        .option('--delay <ms>', 'Pause after each successful institution lookup');
}

export function createProgram(): Command {
    const program = new Command();

    program
        .name('collabmap')
        .description('Build dataset and international collaboration reports for an institution from OpenAlex.')
        .version(VERSION);

    // ─── FETCH command ────────────────────────────────────────

    withCommonOptions(
        program
            .command('fetch')
            .description('Download the institution\'s works from OpenAlex')
            .option('--type <type>', 'OpenAlex work type')
            .option('--per-page <n>', 'Page size (max 200)')
            .option('--max-works <n>', 'Stop after this many works')
    ).action(async (opts: FetchOptions) => {
        await runCommand(opts, async (config) => {
            const result = await harvestWorks(config);
            console.log(`Fetched ${result.count} works to ${result.outputPath}`);
        });
    });

    // ─── DATASETS command ─────────────────────────────────────

    withReportOptions(
        program
            .command('datasets')
            .description('Write the deduplicated list of the institution\'s datasets')
    ).action(async (opts: ReportOptions) => {
        await runCommand(opts, async (config) => {
            const result = buildDatasetsReport(config);
            console.log(`Wrote ${result.count} datasets to ${result.outputPath}`);
        });
    });

    // ─── COLLABORATIONS command ───────────────────────────────

    withReportOptions(
        program
            .command('collaborations')
            .description('Write international collaborations grouped by partner country')
    ).action(async (opts: ReportOptions) => {
        await runCommand(opts, async (config) => {
            const result = await buildCollaborationsReport(config);
            console.log(`Wrote ${result.count} countries to ${result.outputPath}`);
        });
    });

    // ─── BUILD command ────────────────────────────────────────

    withReportOptions(
        program
            .command('build')
            .description('Write both the datasets and the collaborations reports')
    ).action(async (opts: ReportOptions) => {
        await runCommand(opts, async (config) => {
            assertInputs([config.worksPath, config.countryCodesPath]);

            const datasets = buildDatasetsReport(config);
            console.log(`Wrote ${datasets.count} datasets to ${datasets.outputPath}`);
            const collaborations = await buildCollaborationsReport(config);
            console.log(`Wrote ${collaborations.count} countries to ${collaborations.outputPath}`);
        });
    });

    return program;
}
