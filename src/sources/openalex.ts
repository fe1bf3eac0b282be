import type { OpenAlexWork, OpenAlexWorksPage } from '../types/index.js';
import { getHttpClient, type HttpClient, type HttpResponse } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { isRecord, isWork } from './utils.js';

const OPENALEX_BASE = 'https://api.openalex.org';

/**
 * Largest page size the /works endpoint accepts.
 */
const MAX_PER_PAGE = 200;

/**
 * Single-record institution lookup, the only call the country resolver makes.
 */
export interface InstitutionLookup {
    fetchInstitution(shortId: string): Promise<HttpResponse<unknown>>;
}

export interface OpenAlexClientOptions {
    apiKey?: string;
    /** Contact email for the polite pool */
    email?: string;
    /** Per-request timeout for institution lookups */
    lookupTimeoutMs?: number;
    httpClient?: HttpClient;
}

export interface WorksQuery {
    ror: string;
    type: string;
    perPage?: number;
    maxWorks?: number;
}

/**
 * OpenAlex API client: institution lookups and cursor-paged work harvesting.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexClient implements InstitutionLookup {
    private readonly httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly email?: string;
    private readonly lookupTimeoutMs: number;

    constructor(options: OpenAlexClientOptions = {}) {
        this.apiKey = options.apiKey ?? process.env['OPENALEX_API_KEY'];
        this.email = options.email;
        this.lookupTimeoutMs = options.lookupTimeoutMs ?? 10000;
        this.httpClient = options.httpClient ?? getHttpClient();
    }

    /**
     * Fetch one institution record. Failures surface as HttpError; no retries,
     * the caller decides what a failed lookup means.
     */
    async fetchInstitution(shortId: string): Promise<HttpResponse<unknown>> {
        const params = new URLSearchParams();
        this.addAuthParams(params);

        const query = params.toString();
        const url = `${OPENALEX_BASE}/institutions/${encodeURIComponent(shortId)}${query ? `?${query}` : ''}`;
        getLogger().debug({ url }, 'OpenAlex institution lookup');

        return this.httpClient.get<unknown>(url, {
            source: 'openalex',
            timeout: this.lookupTimeoutMs,
            retries: 0,
        });
    }

    /**
     * Harvest every work of `type` with an author affiliated to `ror`.
     * Pages are fetched one after another until the cursor runs out.
     */
    async fetchInstitutionWorks(query: WorksQuery): Promise<OpenAlexWork[]> {
        const logger = getLogger();
        const perPage = Math.max(1, Math.min(query.perPage ?? MAX_PER_PAGE, MAX_PER_PAGE));
        const works: OpenAlexWork[] = [];
        let cursor: string | null = '*';
        let page = 0;

        while (cursor) {
            const params = new URLSearchParams({
                filter: `type:${query.type},authorships.institutions.ror:${query.ror}`,
                per_page: String(perPage),
                cursor,
            });
            this.addAuthParams(params);

            const url = `${OPENALEX_BASE}/works?${params.toString()}`;
            logger.debug({ url, page }, 'OpenAlex works page');

            const response = await this.httpClient.get<unknown>(url, { source: 'openalex' });
            const body = parseWorksPage(response.data);
            if (page === 0) {
                logger.info({ total: body.meta.count, ror: query.ror }, 'Matching works reported by OpenAlex');
            }

            if (body.results.length === 0) break;
            works.push(...body.results);
            page++;

            if (query.maxWorks !== undefined && works.length >= query.maxWorks) {
                return works.slice(0, query.maxWorks);
            }

            cursor = body.meta.next_cursor ?? null;
        }

        return works;
    }

    private addAuthParams(params: URLSearchParams): void {
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
        if (this.email) {
            params.set('mailto', this.email);
        }
    }
}

/**
 * Accept a /works page, keeping only object entries of `results`.
 */
function parseWorksPage(data: unknown): OpenAlexWorksPage {
    const meta = isRecord(data) ? data['meta'] : undefined;
    const rawResults = isRecord(data) ? data['results'] : undefined;
    if (!isRecord(meta) || !Array.isArray(rawResults)) {
        throw new Error('Unexpected OpenAlex works response shape');
    }

    const results = rawResults.filter(isWork);
    const count = meta['count'];
    const perPage = meta['per_page'];
    const nextCursor = meta['next_cursor'];

    return {
        meta: {
            count: typeof count === 'number' ? count : results.length,
            per_page: typeof perPage === 'number' ? perPage : results.length,
            next_cursor: typeof nextCursor === 'string' && nextCursor ? nextCursor : null,
        },
        results,
    };
}
