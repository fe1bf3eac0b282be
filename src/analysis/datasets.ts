import type { DatasetRecord, OpenAlexWork } from '../types/index.js';
import { hasTargetInstitution, workTitle } from './membership.js';
import { compareCodePoints } from './ordering.js';

/**
 * Every dataset with at least one author from the target institution, one
 * record per work id (first occurrence wins), newest first then by title
 * descending by code point.
 */
export function dedupeDatasets(works: OpenAlexWork[], targetRor: string): DatasetRecord[] {
    const seen = new Set<string>();
    const datasets: DatasetRecord[] = [];

    for (const work of works) {
        if (!hasTargetInstitution(work, targetRor)) continue;

        const id = work.id;
        if (!id || seen.has(id)) continue;
        seen.add(id);

        datasets.push({
            dataset_id: id,
            title: workTitle(work),
            year: work.publication_year ?? null,
        });
    }

    return datasets.sort((a, b) => {
        const byYear = (b.year ?? 0) - (a.year ?? 0);
        if (byYear !== 0) return byYear;
        return compareCodePoints(b.title ?? '', a.title ?? '');
    });
}
