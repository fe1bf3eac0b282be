/**
 * OpenAlex payload types (subset of the fields the reports read).
 * Every field is optional: records come from a loosely-typed JSON dump.
 */

export interface OpenAlexInstitution {
    /** e.g. "https://openalex.org/I55143463" */
    id?: string | null;
    display_name?: string | null;
    ror?: string | null;
    country_code?: string | null;
    type?: string | null;
}

export interface OpenAlexAuthorship {
    author?: { id?: string | null; display_name?: string | null } | null;
    author_position?: string | null;
    institutions?: OpenAlexInstitution[] | null;
}

export interface OpenAlexWork {
    id?: string | null;
    display_name?: string | null;
    title?: string | null;
    publication_year?: number | null;
    type?: string | null;
    authorships?: OpenAlexAuthorship[] | null;
}

/**
 * Paged list response from the /works endpoint.
 */
export interface OpenAlexWorksPage {
    meta: { count: number; per_page: number; next_cursor?: string | null };
    results: OpenAlexWork[];
}

/**
 * ROR of the institution analysed when no other is configured.
 */
export const DEFAULT_TARGET_ROR = 'https://ror.org/00bgk9508';
