import { describe, it, expect, vi } from 'vitest';
import { aggregateCollaborations, buildCollaborationReport } from '../analysis/collaborations.js';
import { InstitutionCountryResolver } from '../analysis/country-resolver.js';
import type { CountryAggregate, CountryCache, CountryTable, OpenAlexWork } from '../types/index.js';
import { TARGET_ROR, target, institution, work, lookupResponse } from './fixtures.js';

function setup(countries: Record<string, string> = {}) {
    const fetchInstitution = vi.fn(async (shortId: string) =>
        lookupResponse({ country_code: countries[shortId] ?? null })
    );
    const resolver = new InstitutionCountryResolver({ lookup: { fetchInstitution }, delayMs: 0 });
    const cache: CountryCache = new Map();
    const run = (works: OpenAlexWork[]) =>
        aggregateCollaborations(works, { resolver, cache, targetRor: TARGET_ROR });
    return { run, fetchInstitution, cache };
}

describe('aggregateCollaborations', () => {
    it('should record a collaboration with the partner country', async () => {
        const { run } = setup();
        const w1 = work('w1', 'Study A', 2021, [target, institution('I1', 'Institut One', 'FR')]);

        const result = await run([w1]);

        expect([...result.keys()]).toEqual(['FR']);
        expect(result.get('FR')).toEqual({
            country_code: 'FR',
            collaborations: [
                { partner: 'Institut One', dataset_id: 'w1', title: 'Study A', year: 2021 },
            ],
        });
    });

    it('should skip works without a target-institution author', async () => {
        const { run, fetchInstitution } = setup({ I2: 'DE' });
        const w = work('w2', 'Elsewhere', 2020, [institution('I1', 'Institut One', 'FR')], [institution('I2', 'Uni Two')]);

        const result = await run([w]);

        expect(result.size).toBe(0);
        expect(fetchInstitution).not.toHaveBeenCalled();
    });

    it('should skip works whose institutions are all the target', async () => {
        const { run } = setup();
        const w = work('w3', 'Internal', 2022, [target], [target]);

        expect((await run([w])).size).toBe(0);
    });

    it('should record the same institution once per work and country', async () => {
        const { run } = setup();
        const partner = institution('I1', 'Institut One', 'FR');
        const w = work('w4', 'Shared', 2019, [target, partner], [partner]);

        const result = await run([w]);

        expect(result.get('FR')?.collaborations).toHaveLength(1);
    });

    it('should record distinct institutions of one country separately', async () => {
        const { run } = setup();
        const w = work(
            'w5',
            'Two Partners',
            2018,
            [target, institution('I1', 'Institut One', 'FR')],
            [institution('I2', 'Institut Two', 'FR')]
        );

        const result = await run([w]);

        expect(result.get('FR')?.collaborations.map((c) => c.partner)).toEqual(['Institut One', 'Institut Two']);
    });

    it('should count the same institution again in a different work', async () => {
        const { run } = setup();
        const partner = institution('I1', 'Institut One', 'FR');
        const works = [
            work('w6', 'First', 2020, [target, partner]),
            work('w7', 'Second', 2021, [target, partner]),
        ];

        const result = await run(works);

        expect(result.get('FR')?.collaborations.map((c) => c.dataset_id)).toEqual(['w6', 'w7']);
    });

    it('should drop institutions whose country cannot be resolved', async () => {
        const { run } = setup();
        const w = work('w8', 'Unknown', 2020, [target, { display_name: 'No Id' }, institution('I3', 'Lookup Empty')]);

        expect((await run([w])).size).toBe(0);
    });

    it('should resolve missing codes through one lookup per institution', async () => {
        const { run, fetchInstitution, cache } = setup({ I4: 'JP' });
        const partner = institution('I4', 'Tokyo Lab');
        const works = [
            work('w9', 'One', 2020, [target, partner]),
            work('w10', 'Two', 2021, [target], [partner]),
        ];

        const result = await run(works);

        expect(fetchInstitution).toHaveBeenCalledTimes(1);
        expect(cache.get('I4')).toBe('JP');
        expect(result.get('JP')?.collaborations).toHaveLength(2);
    });

    it('should fall back to the work title when display_name is missing', async () => {
        const { run } = setup();
        const w: OpenAlexWork = {
            id: 'w11',
            title: 'Raw Title',
            authorships: [{ institutions: [target, institution('I1', 'Institut One', 'FR')] }],
        };

        const result = await run([w]);

        expect(result.get('FR')?.collaborations[0]).toEqual({
            partner: 'Institut One',
            dataset_id: 'w11',
            title: 'Raw Title',
            year: null,
        });
    });

    it('should tolerate works without authorships', async () => {
        const { run } = setup();
        expect((await run([{ id: 'w12' }, { id: 'w13', authorships: null }])).size).toBe(0);
    });
});

describe('buildCollaborationReport', () => {
    const table: CountryTable = new Map([
        ['FR', { name: 'France', latitude: 46.2, longitude: 2.2, coords: [46.2, 2.2] }],
        ['DE', { name: 'Germany', latitude: 51.1, longitude: 10.4, coords: [51.1, 10.4] }],
    ]);

    function aggregate(code: string, count: number): CountryAggregate {
        return {
            country_code: code,
            collaborations: Array.from({ length: count }, (_, i) => ({
                partner: `Partner ${i}`,
                dataset_id: `w${i}`,
                title: `Title ${i}`,
                year: 2020,
            })),
        };
    }

    it('should order countries by collaboration count', () => {
        const aggregates = new Map([
            ['DE', aggregate('DE', 3)],
            ['FR', aggregate('FR', 5)],
        ]);

        const report = buildCollaborationReport(aggregates, table);

        expect(report.map((e) => [e.country_code, e.collaborations_count])).toEqual([
            ['FR', 5],
            ['DE', 3],
        ]);
    });

    it('should sort collaborations by year then partner, descending', () => {
        const aggregates = new Map<string, CountryAggregate>([
            ['FR', {
                country_code: 'FR',
                collaborations: [
                    { partner: 'B', dataset_id: 'w1', title: 't1', year: 2020 },
                    { partner: 'Z', dataset_id: 'w2', title: 't2', year: null },
                    { partner: 'A', dataset_id: 'w3', title: 't3', year: 2022 },
                    { partner: 'C', dataset_id: 'w4', title: 't4', year: 2020 },
                ],
            }],
        ]);

        const [entry] = buildCollaborationReport(aggregates, table);

        expect(entry?.collaborations.map((c) => c.dataset_id)).toEqual(['w3', 'w4', 'w1', 'w2']);
    });

    it('should compare partner names by code point', () => {
        const aggregates = new Map<string, CountryAggregate>([
            ['FR', {
                country_code: 'FR',
                collaborations: [
                    { partner: 'Lab \uFFFD', dataset_id: 'w1', title: 't1', year: 2021 },
                    { partner: 'Lab \u{1F30D}', dataset_id: 'w2', title: 't2', year: 2021 },
                ],
            }],
        ]);

        const [entry] = buildCollaborationReport(aggregates, table);

        expect(entry?.collaborations.map((c) => c.dataset_id)).toEqual(['w2', 'w1']);
    });

    it('should attach country details from the table', () => {
        const [entry] = buildCollaborationReport(new Map([['DE', aggregate('DE', 1)]]), table);

        expect(entry?.country).toEqual({ name: 'Germany', latitude: 51.1, longitude: 10.4, coords: [51.1, 10.4] });
    });

    it('should fall back to the code when the country is not in the table', () => {
        const [entry] = buildCollaborationReport(new Map([['XK', aggregate('XK', 2)]]), table);

        expect(entry).toMatchObject({
            country_code: 'XK',
            collaborations_count: 2,
            country: { name: 'XK', latitude: 0, longitude: 0, coords: [0, 0] },
        });
    });

    it('should not reorder the aggregate it was given', () => {
        const fr: CountryAggregate = {
            country_code: 'FR',
            collaborations: [
                { partner: 'A', dataset_id: 'w1', title: 't1', year: 2010 },
                { partner: 'B', dataset_id: 'w2', title: 't2', year: 2020 },
            ],
        };
        buildCollaborationReport(new Map([['FR', fr]]), table);

        expect(fr.collaborations.map((c) => c.year)).toEqual([2010, 2020]);
    });
});
