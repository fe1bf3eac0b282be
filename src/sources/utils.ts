import type { OpenAlexWork } from '../types/index.js';

/**
 * Shared utilities for OpenAlex identifiers and payloads.
 */

/**
 * Short institution id: the text after the final "/" of the full id.
 * "https://openalex.org/I55143463" → "I55143463"
 * "I55143463" → "I55143463"
 * Returns null when the id is missing or empty.
 */
export function shortInstitutionId(id: string | null | undefined): string | null {
    if (!id) return null;
    return id.slice(id.lastIndexOf('/') + 1);
}

/**
 * Plain JSON object check used to accept loosely-typed payloads.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Work records are accepted as-is once they are objects; individual fields are
 * checked where they are read.
 */
export function isWork(value: unknown): value is OpenAlexWork {
    return isRecord(value);
}
