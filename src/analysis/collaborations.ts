import type {
    CollaborationRecord,
    CollaborationReportEntry,
    CountryAggregate,
    CountryCache,
    CountryInfo,
    CountryTable,
    OpenAlexInstitution,
    OpenAlexWork,
} from '../types/index.js';
import type { InstitutionCountryResolver } from './country-resolver.js';
import { hasTargetInstitution, isTargetInstitution, workTitle } from './membership.js';
import { compareCodePoints } from './ordering.js';
import { getLogger } from '../utils/logger.js';

export interface AggregateOptions {
    resolver: InstitutionCountryResolver;
    /** Per-run memo of institution countries; owned by the caller */
    cache: CountryCache;
    targetRor: string;
}

interface ExternalPair {
    institution: OpenAlexInstitution;
    countryCode: string;
}

/**
 * Group the target institution's works by the countries of their external
 * co-authoring institutions.
 *
 * A work contributes only when it has a target-institution author and at least
 * one external institution with a resolvable country. Within a work, each
 * (work id, institution id, country) triple is recorded once.
 */
export async function aggregateCollaborations(
    works: OpenAlexWork[],
    options: AggregateOptions
): Promise<Map<string, CountryAggregate>> {
    const { resolver, cache, targetRor } = options;
    const byCountry = new Map<string, CountryAggregate>();

    for (const work of works) {
        if (!hasTargetInstitution(work, targetRor)) continue;

        const pairs: ExternalPair[] = [];
        for (const authorship of work.authorships ?? []) {
            for (const institution of authorship.institutions ?? []) {
                if (isTargetInstitution(institution, targetRor)) continue;

                const countryCode = await resolver.resolve(institution, cache);
                if (!countryCode) continue;

                pairs.push({ institution, countryCode });
            }
        }

        if (pairs.length === 0) continue;

        const workId = work.id ?? null;
        const title = workTitle(work);
        const year = work.publication_year ?? null;
        const seen = new Set<string>();

        for (const { institution, countryCode } of pairs) {
            const key = JSON.stringify([workId, institution.id ?? null, countryCode]);
            if (seen.has(key)) continue;
            seen.add(key);

            let bucket = byCountry.get(countryCode);
            if (!bucket) {
                bucket = { country_code: countryCode, collaborations: [] };
                byCountry.set(countryCode, bucket);
            }

            bucket.collaborations.push({
                partner: institution.display_name ?? null,
                dataset_id: workId,
                title,
                year,
            });
        }
    }

    return byCountry;
}

/**
 * Newest first, then partner name descending by code point. The sort is
 * stable, so full ties keep aggregation order.
 */
function sortCollaborations(collaborations: CollaborationRecord[]): CollaborationRecord[] {
    return [...collaborations].sort((a, b) => {
        const byYear = (b.year ?? 0) - (a.year ?? 0);
        if (byYear !== 0) return byYear;
        return compareCodePoints(b.partner ?? '', a.partner ?? '');
    });
}

function fallbackCountry(code: string): CountryInfo {
    return { name: code, latitude: 0, longitude: 0, coords: [0, 0] };
}

/**
 * Turn the aggregate into the published report: collaborations newest first,
 * countries by collaboration count, each enriched from the country table.
 */
export function buildCollaborationReport(
    aggregates: Map<string, CountryAggregate>,
    countryTable: CountryTable
): CollaborationReportEntry[] {
    const logger = getLogger();
    const entries: CollaborationReportEntry[] = [];

    for (const [code, aggregate] of aggregates) {
        const info = countryTable.get(code);
        if (!info) {
            logger.warn({ countryCode: code }, 'Country code not found in country table');
        }

        entries.push({
            country_code: code,
            collaborations_count: aggregate.collaborations.length,
            collaborations: sortCollaborations(aggregate.collaborations),
            country: info
                ? { name: info.name, latitude: info.latitude, longitude: info.longitude, coords: [info.latitude, info.longitude] }
                : fallbackCountry(code),
        });
    }

    return entries.sort((a, b) => b.collaborations_count - a.collaborations_count);
}
