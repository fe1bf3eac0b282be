import type { OpenAlexInstitution, OpenAlexWork } from '../types/index.js';

/**
 * True when the institution carries the target ROR.
 */
export function isTargetInstitution(institution: OpenAlexInstitution, targetRor: string): boolean {
    return institution.ror === targetRor;
}

/**
 * A work belongs to the target institution when at least one of its
 * authorships lists an institution with the target ROR.
 */
export function hasTargetInstitution(work: OpenAlexWork, targetRor: string): boolean {
    return (work.authorships ?? []).some((authorship) =>
        (authorship.institutions ?? []).some((inst) => isTargetInstitution(inst, targetRor))
    );
}

/**
 * Display title of a work: `display_name`, then `title`.
 */
export function workTitle(work: OpenAlexWork): string | null {
    return work.display_name || work.title || null;
}
