import { existsSync, readFileSync } from 'node:fs';
import type { OpenAlexWork } from '../types/index.js';
import { isWork } from '../sources/utils.js';
import { getLogger } from '../utils/logger.js';
import { InvalidInputError, MissingInputError } from './errors.js';

/**
 * Read the harvested works dump: a JSON array of OpenAlex work objects.
 */
export function loadWorks(path: string): OpenAlexWork[] {
    if (!existsSync(path)) {
        throw new MissingInputError(path, 'run `collabmap fetch` first');
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new InvalidInputError(path, `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
    }

    if (!Array.isArray(parsed)) {
        throw new InvalidInputError(path, 'expected a JSON array of works');
    }

    const works = parsed.filter(isWork);
    if (works.length < parsed.length) {
        getLogger().warn({ path, dropped: parsed.length - works.length }, 'Skipped non-object entries in works file');
    }

    getLogger().debug({ path, works: works.length }, 'Works loaded');
    return works;
}
