import { existsSync, readFileSync } from 'node:fs';
import { csvParse } from 'd3-dsv';
import type { CountryTable } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { MissingInputError } from './errors.js';

/**
 * Parse a coordinate cell. Blank or non-numeric cells give null.
 */
function toCoordinate(value: string | undefined): number | null {
    const trimmed = value?.trim() ?? '';
    if (trimmed.length === 0) return null;

    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parse the country CSV (`country,latitude,longitude,name`, any column order).
 * Rows without a code or with unusable coordinates are skipped.
 */
export function parseCountryTable(text: string): CountryTable {
    const table: CountryTable = new Map();

    for (const row of csvParse(text)) {
        const code = row['country']?.trim() ?? '';
        if (!code) continue;

        const latitude = toCoordinate(row['latitude']);
        const longitude = toCoordinate(row['longitude']);
        if (latitude === null || longitude === null) continue;

        table.set(code, {
            name: row['name']?.trim() ?? '',
            latitude,
            longitude,
            coords: [latitude, longitude],
        });
    }

    return table;
}

export function loadCountryTable(path: string): CountryTable {
    if (!existsSync(path)) {
        throw new MissingInputError(path);
    }

    const table = parseCountryTable(readFileSync(path, 'utf-8'));
    getLogger().info({ path, countries: table.size }, 'Country table loaded');
    return table;
}
