import { existsSync } from 'node:fs';
import type { CollabMapConfig, CountryCache } from '../types/index.js';
import { OpenAlexClient, type InstitutionLookup } from '../sources/openalex.js';
import { InstitutionCountryResolver } from '../analysis/country-resolver.js';
import { aggregateCollaborations, buildCollaborationReport } from '../analysis/collaborations.js';
import { dedupeDatasets } from '../analysis/datasets.js';
import { loadWorks } from '../io/works-loader.js';
import { loadCountryTable } from '../io/country-table.js';
import { MissingInputError } from '../io/errors.js';
import { writeReport } from '../exporters/report-writer.js';
import { getLogger } from '../utils/logger.js';

export interface BuildResult {
    outputPath: string;
    count: number;
}

function createClient(config: CollabMapConfig): OpenAlexClient {
    return new OpenAlexClient({
        apiKey: config.apiKey,
        email: config.email,
        lookupTimeoutMs: config.requestTimeoutMs,
    });
}

/**
 * Fail with MissingInputError on the first path that does not exist. Commands
 * call this before reading or writing anything.
 */
export function assertInputs(paths: string[]): void {
    for (const path of paths) {
        if (!existsSync(path)) throw new MissingInputError(path);
    }
}

/**
 * Download every work of the configured type for the target institution.
 */
export async function harvestWorks(
    config: CollabMapConfig,
    client: OpenAlexClient = createClient(config)
): Promise<BuildResult> {
    const logger = getLogger();
    logger.info({ ror: config.targetRor, type: config.workType }, 'Harvesting works');

    const works = await client.fetchInstitutionWorks({
        ror: config.targetRor,
        type: config.workType,
        perPage: config.perPage,
        maxWorks: config.maxWorks,
    });

    writeReport(config.worksPath, works);
    logger.info({ works: works.length, outputPath: config.worksPath }, 'Works saved');
    return { outputPath: config.worksPath, count: works.length };
}

/**
 * Deduplicated list of every dataset involving the target institution.
 */
export function buildDatasetsReport(config: CollabMapConfig): BuildResult {
    const works = loadWorks(config.worksPath);
    const datasets = dedupeDatasets(works, config.targetRor);

    writeReport(config.datasetsOut, datasets);
    getLogger().info({ input: works.length, datasets: datasets.length }, 'Datasets report built');
    return { outputPath: config.datasetsOut, count: datasets.length };
}

/**
 * Per-country international collaboration report.
 *
 * Both inputs are checked before anything is read. The institution country
 * cache lives for this call only.
 */
export async function buildCollaborationsReport(
    config: CollabMapConfig,
    lookup: InstitutionLookup = createClient(config)
): Promise<BuildResult> {
    const logger = getLogger();

    assertInputs([config.worksPath, config.countryCodesPath]);

    const countryTable = loadCountryTable(config.countryCodesPath);
    const works = loadWorks(config.worksPath);

    const cache: CountryCache = new Map();
    const resolver = new InstitutionCountryResolver({ lookup, delayMs: config.lookupDelayMs });
    const aggregates = await aggregateCollaborations(works, {
        resolver,
        cache,
        targetRor: config.targetRor,
    });

    const report = buildCollaborationReport(aggregates, countryTable);
    writeReport(config.collaborationsOut, report);

    logger.info(
        { input: works.length, countries: report.length, institutionLookups: cache.size },
        'Collaborations report built'
    );
    return { outputPath: config.collaborationsOut, count: report.length };
}
