import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, LOG_LEVELS, isLogLevel, type CollabMapConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Load configuration from collabmap.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults apply.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<CollabMapConfig> | null> {
    const explorer = cosmiconfig('collabmap', {
        searchPlaces: ['collabmap.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty && isRecord(result.config)) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return result.config;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

function isRecord(value: unknown): value is Partial<CollabMapConfig> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<CollabMapConfig> {
    const config: Partial<CollabMapConfig> = {};

    if (env['OPENALEX_EMAIL']) config.email = env['OPENALEX_EMAIL'];
    if (env['OPENALEX_API_KEY']) config.apiKey = env['OPENALEX_API_KEY'];
    if (env['COLLABMAP_TARGET_ROR']) config.targetRor = env['COLLABMAP_TARGET_ROR'];

    return config;
}

/**
 * Drop keys whose value is undefined so they don't shadow lower-precedence sources.
 */
function defined(partial: Partial<CollabMapConfig>): Partial<CollabMapConfig> {
    const result: Partial<CollabMapConfig> = {};
    for (const [key, value] of Object.entries(partial)) {
        if (value !== undefined) Object.assign(result, { [key]: value });
    }
    return result;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * Throws when the merged log level is not one pino knows.
 */
export async function resolveConfig(
    cliFlags: Partial<CollabMapConfig>,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<CollabMapConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    const config: CollabMapConfig = {
        ...DEFAULT_CONFIG,
        ...defined(fileConfig ?? {}),
        ...defined(envConfig),
        ...defined(cliFlags),
    };

    if (!isLogLevel(config.logLevel)) {
        throw new Error(`Invalid log level: ${String(config.logLevel)}. Valid: ${LOG_LEVELS.join(', ')}`);
    }

    return config;
}
