import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { getLogger } from '../utils/logger.js';

/**
 * Write a report as pretty-printed UTF-8 JSON, creating parent directories.
 */
export function writeReport(outputPath: string, data: unknown): void {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    getLogger().debug({ outputPath }, 'Report written');
}

/**
 * Read a report written by `writeReport`.
 */
export function readReport(inputPath: string): unknown {
    return JSON.parse(readFileSync(inputPath, 'utf-8'));
}
