import type { OpenAlexInstitution, OpenAlexWork } from '../types/index.js';
import type { HttpResponse } from '../utils/http-client.js';

export const TARGET_ROR = 'https://ror.org/test-target';

export const target: OpenAlexInstitution = {
    id: 'https://openalex.org/I0',
    display_name: 'Target University',
    ror: TARGET_ROR,
    country_code: 'IT',
};

export function institution(
    shortId: string,
    name: string,
    countryCode?: string | null
): OpenAlexInstitution {
    return {
        id: `https://openalex.org/${shortId}`,
        display_name: name,
        ror: `https://ror.org/${shortId.toLowerCase()}`,
        country_code: countryCode,
    };
}

/**
 * A work with one authorship per institution list.
 */
export function work(
    id: string | null,
    title: string,
    year: number | null,
    ...authorships: OpenAlexInstitution[][]
): OpenAlexWork {
    return {
        id,
        display_name: title,
        publication_year: year,
        authorships: authorships.map((institutions) => ({ institutions })),
    };
}

export function lookupResponse(data: unknown, status = 200): HttpResponse<unknown> {
    return { status, headers: {}, data, ok: status >= 200 && status < 300 };
}
