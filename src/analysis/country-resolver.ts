import type { CountryCache, OpenAlexInstitution } from '../types/index.js';
import type { InstitutionLookup } from '../sources/openalex.js';
import { isRecord, shortInstitutionId } from '../sources/utils.js';
import { sleep } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

export interface CountryResolverOptions {
    lookup: InstitutionLookup;
    /** Pause after each successful lookup, in milliseconds */
    delayMs?: number;
}

/**
 * Resolves the country code of an institution found on a work.
 *
 * The embedded `country_code` wins. Otherwise the institution is looked up by
 * its short id, memoized in the caller's cache. Only successful responses are
 * cached (an empty code included); a failed lookup returns '' and may be tried
 * again later in the same run. `resolve` never rejects.
 */
export class InstitutionCountryResolver {
    private readonly lookup: InstitutionLookup;
    private readonly delayMs: number;

    constructor(options: CountryResolverOptions) {
        this.lookup = options.lookup;
        this.delayMs = options.delayMs ?? 100;
    }

    async resolve(institution: OpenAlexInstitution, cache: CountryCache): Promise<string> {
        if (institution.country_code) {
            return institution.country_code;
        }

        const shortId = shortInstitutionId(institution.id);
        if (!shortId) return '';

        const cached = cache.get(shortId);
        if (cached !== undefined) return cached;

        const code = await this.lookupCountry(shortId);
        if (code === null) return '';

        cache.set(shortId, code);
        if (this.delayMs > 0) {
            await sleep(this.delayMs);
        }
        return code;
    }

    /**
     * Country code from a successful lookup, or null when the lookup failed.
     */
    private async lookupCountry(shortId: string): Promise<string | null> {
        try {
            const response = await this.lookup.fetchInstitution(shortId);
            if (response.status !== 200 || !isRecord(response.data)) {
                getLogger().debug({ shortId, status: response.status }, 'Unusable institution lookup response');
                return null;
            }
            const code = response.data['country_code'];
            return typeof code === 'string' ? code : '';
        } catch (error) {
            getLogger().debug({ shortId, error }, 'Institution lookup failed');
            return null;
        }
    }
}
