import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type IndexConfig } from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Load configuration from pkgindex.config.json using cosmiconfig.
 * An explicit path must exist; without one, a missing file means defaults.
 */
async function loadConfigFile(configPath?: string): Promise<Partial<IndexConfig> | null> {
    const explorer = cosmiconfig('pkgindex', {
        searchPlaces: ['pkgindex.config.json'],
    });

    if (configPath) {
        try {
            const result = await explorer.load(configPath);
            return (result?.config as Partial<IndexConfig> | undefined) ?? null;
        } catch (error) {
            throw new ConfigError(`Failed to load config file ${configPath}: ${String(error)}`);
        }
    }

    try {
        const result = await explorer.search();
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return result.config as Partial<IndexConfig>;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<IndexConfig>,
    configPath?: string
): Promise<IndexConfig> {
    const fileConfig = await loadConfigFile(configPath);
    return mergeConfig(fileConfig ?? {}, cliFlags);
}

/**
 * Layer config file values and CLI flags over the defaults.
 * Callers leave unset flags out of `cliFlags` rather than passing undefined.
 */
export function mergeConfig(
    fileConfig: Partial<IndexConfig>,
    cliFlags: Partial<IndexConfig>
): IndexConfig {
    const merged: IndexConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...cliFlags,
        // Deep merge nested objects
        extracts: {
            ...DEFAULT_CONFIG.extracts,
            ...fileConfig.extracts,
            ...cliFlags.extracts,
        },
    };

    validateConfig(merged);
    return merged;
}

function validateConfig(config: IndexConfig): void {
    if (!config.extracts.packageIndex) {
        throw new ConfigError('No package index extract configured (extracts.packageIndex)');
    }
    if (!config.extracts.dependencies) {
        throw new ConfigError('No dependency extract configured (extracts.dependencies)');
    }
    if (!Number.isInteger(config.batchSize) || config.batchSize < 1) {
        throw new ConfigError(`batchSize must be a positive integer, got ${config.batchSize}`);
    }
}
